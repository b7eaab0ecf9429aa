import { DependencyGraph } from '../../src/analyzer/dependency-graph';

describe('DependencyGraph', () => {
  let graph: DependencyGraph;

  beforeEach(() => {
    graph = new DependencyGraph();
  });

  it('should initialize with zero nodes and edges', () => {
    expect(graph.nodeCount).toBe(0);
    expect(graph.edgeCount).toBe(0);
    expect(graph.nodes()).toEqual([]);
  });

  // --- Node Tests ---
  describe('Nodes', () => {
    it('should add nodes correctly', () => {
      graph.addNode('app/Main.fxml');
      graph.addNode('app/Header.fxml');
      expect(graph.hasNode('app/Main.fxml')).toBe(true);
      expect(graph.hasNode('app/Header.fxml')).toBe(true);
      expect(graph.hasNode('app/Footer.fxml')).toBe(false);
      expect(graph.nodeCount).toBe(2);
    });

    it('should not add duplicate nodes', () => {
      graph.addNode('app/Main.fxml');
      graph.addNode('app/Main.fxml');
      expect(graph.nodes()).toEqual(['app/Main.fxml']);
    });
  });

  // --- Edge Tests ---
  describe('Edges', () => {
    it('should add edges and create missing nodes', () => {
      graph.addEdge('Main.fxml', 'Header.fxml');
      graph.addEdge('Main.fxml', 'Footer.fxml');

      expect(graph.hasEdge('Main.fxml', 'Header.fxml')).toBe(true);
      expect(graph.hasEdge('Header.fxml', 'Main.fxml')).toBe(false);
      expect(graph.nodeCount).toBe(3);
      expect(graph.edgeCount).toBe(2);
    });

    it('should not add duplicate edges', () => {
      graph.addEdge('Main.fxml', 'Header.fxml');
      graph.addEdge('Main.fxml', 'Header.fxml');
      expect(graph.edgeCount).toBe(1);
      expect(graph.outEdges('Main.fxml')).toEqual(['Header.fxml']);
      expect(graph.inEdges('Header.fxml')).toEqual(['Main.fxml']);
    });

    it('should return empty edge lists for unknown nodes', () => {
      expect(graph.outEdges('nonexistent.fxml')).toEqual([]);
      expect(graph.inEdges('nonexistent.fxml')).toEqual([]);
    });

    it('should remove only the outgoing edges of a node', () => {
      graph.addEdge('Main.fxml', 'Header.fxml');
      graph.addEdge('Main.fxml', 'Footer.fxml');
      graph.addEdge('Other.fxml', 'Header.fxml');

      graph.removeOutEdges('Main.fxml');

      expect(graph.outEdges('Main.fxml')).toEqual([]);
      expect(graph.inEdges('Header.fxml')).toEqual(['Other.fxml']);
      expect(graph.inEdges('Footer.fxml')).toEqual([]);
      expect(graph.hasNode('Main.fxml')).toBe(true);
      expect(graph.edgeCount).toBe(1);
    });
  });

  // --- Affected set ---
  describe('findAffected', () => {
    it('should walk up through every includer', () => {
      graph.addEdge('A.fxml', 'B.fxml');
      graph.addEdge('B.fxml', 'C.fxml');
      graph.addEdge('Unrelated.fxml', 'D.fxml');

      expect(graph.findAffected('C.fxml')).toEqual(new Set(['C.fxml', 'B.fxml', 'A.fxml']));
      expect(graph.findAffected('B.fxml')).toEqual(new Set(['B.fxml', 'A.fxml']));
    });

    it('should contain the start path even when it is unknown', () => {
      expect(graph.findAffected('Lonely.fxml')).toEqual(new Set(['Lonely.fxml']));
    });

    it('should terminate on cycles', () => {
      graph.addEdge('A.fxml', 'B.fxml');
      graph.addEdge('B.fxml', 'A.fxml');
      graph.addEdge('Self.fxml', 'Self.fxml');

      expect(graph.findAffected('A.fxml')).toEqual(new Set(['A.fxml', 'B.fxml']));
      expect(graph.findAffected('Self.fxml')).toEqual(new Set(['Self.fxml']));
    });

    it('should follow diamonds once per node', () => {
      graph.addEdge('Top.fxml', 'Left.fxml');
      graph.addEdge('Top.fxml', 'Right.fxml');
      graph.addEdge('Left.fxml', 'Bottom.fxml');
      graph.addEdge('Right.fxml', 'Bottom.fxml');

      expect([...graph.findAffected('Bottom.fxml')].sort()).toEqual([
        'Bottom.fxml',
        'Left.fxml',
        'Right.fxml',
        'Top.fxml',
      ]);
    });
  });

  // --- JSON Conversion Test ---
  describe('toJSON', () => {
    it('should return correct JSON representation', () => {
      graph.addEdge('Main.fxml', 'Header.fxml');
      graph.addEdge('Main.fxml', 'Footer.fxml');
      graph.addNode('Isolated.fxml');

      expect(graph.toJSON()).toEqual({
        nodes: [{ id: 'Main.fxml' }, { id: 'Header.fxml' }, { id: 'Footer.fxml' }, { id: 'Isolated.fxml' }],
        links: [
          { source: 'Main.fxml', target: 'Header.fxml' },
          { source: 'Main.fxml', target: 'Footer.fxml' },
        ],
      });
    });

    it('should be empty after clear', () => {
      graph.addEdge('Main.fxml', 'Header.fxml');
      graph.clear();
      expect(graph.toJSON()).toEqual({ nodes: [], links: [] });
    });
  });
});
