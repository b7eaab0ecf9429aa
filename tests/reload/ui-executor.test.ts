import { immediateExecutor } from '../../src/reload/ui-executor';

describe('immediateExecutor', () => {
  it('should run tasks later, in submission order', async () => {
    const order: string[] = [];

    immediateExecutor.runLater(() => order.push('first'));
    immediateExecutor.runLater(() => order.push('second'));
    order.push('sync');
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(order).toEqual(['sync', 'first', 'second']);
  });
});
