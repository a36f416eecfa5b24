/**
 * Notification sinks decide where listener callbacks run.
 *
 * Whatever the sink, notifications are delivered in the order the
 * underlying events occurred.
 */

export type NotificationSink = (notify: () => void) => void

/** Runs every notification synchronously, inside the state transition. */
export const immediateSink: NotificationSink = (notify) => notify()

/**
 * Defers notifications onto a later turn of the event loop and delivers
 * them FIFO. Everything enqueued before a drain runs in the same drain.
 */
export function createQueuedSink(
  schedule: (drain: () => void) => void = setImmediate,
): NotificationSink {
  const queue: Array<() => void> = []
  let scheduled = false

  const drain = (): void => {
    scheduled = false
    while (queue.length > 0) {
      const notify = queue.shift()
      if (!notify) break
      try {
        notify()
      } catch (err) {
        // Keep the rest of the queue moving, then surface the listener error
        if (queue.length > 0 && !scheduled) {
          scheduled = true
          schedule(drain)
        }
        throw err
      }
    }
  }

  return (notify) => {
    queue.push(notify)
    if (!scheduled) {
      scheduled = true
      schedule(drain)
    }
  }
}
