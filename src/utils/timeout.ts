import { TimeoutError } from '../errors.js'

/**
 * Run `fn` under a hard deadline. The signal handed to `fn` is aborted when
 * the deadline passes so SDK calls can stop early; the returned promise
 * rejects with TimeoutError either way.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new TimeoutError(label, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([fn(controller.signal), deadline])
  } finally {
    clearTimeout(timer)
  }
}
