/**
 * Run `operation` unless `signal` is already aborted, and reject with the
 * signal's reason as soon as it aborts. The operation itself is not
 * interrupted; its eventual result is dropped.
 */
export function abortable<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return operation()
  if (signal.aborted) return Promise.reject(signal.reason)

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)
    const release = () => signal.removeEventListener("abort", onAbort)

    signal.addEventListener("abort", onAbort, { once: true })

    let pending: Promise<T>

    try {
      pending = operation()
    } catch (err) {
      release()
      reject(err)
      return
    }

    void pending.then(resolve, reject).finally(release)
  })
}
