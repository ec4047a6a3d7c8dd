/**
 * Race a store operation against a deadline. When the deadline passes first the
 * fallback is returned, so callers that pass `null` fail closed. Rejections of
 * `work` still propagate.
 */
export const withDeadline = async <T>(
  work: Promise<T>,
  timeoutMs: number,
  fallback: T,
): Promise<T> => {
  let timer: ReturnType<typeof setTimeout> | undefined
  const expired = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(fallback), timeoutMs)
  })

  try {
    return await Promise.race([work, expired])
  } finally {
    clearTimeout(timer)
  }
}
