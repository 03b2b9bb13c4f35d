import { getErrorMessage } from '../utils/errors';
import { zone } from '../logging/zone';

const log = zone('discovery.fanout');

/**
 * Run one task per item concurrently and join.
 *
 * Each fulfilled result is handed to `onResult` as soon as it arrives, so the
 * caller can own shared state and mutate it without interleaving. Arrival order
 * across items is not defined. A rejected task is logged and dropped.
 */
export async function fanOut<T, R>(
    items: readonly T[],
    task: (item: T) => Promise<R>,
    onResult: (result: R, item: T) => void,
    label = 'fan-out'
): Promise<void> {
    await Promise.all(items.map(async (item) => {
        let result: R;
        try {
            result = await task(item);
        } catch (err) {
            log.error({ message: 'Task failed', data: { label, error: getErrorMessage(err) } });
            return;
        }
        onResult(result, item);
    }));
}
