import { UiExecutor } from '../types/reloadable';

/**
 * Runs tasks on a later turn of the event loop, in submission order.
 */
export const immediateExecutor: UiExecutor = {
  runLater(task: () => void): void {
    setImmediate(task);
  },
};
