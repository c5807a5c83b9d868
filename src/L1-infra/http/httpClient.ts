/** Non-2xx HTTP response. */
export class HttpError extends Error {
  constructor(public readonly status: number, statusText: string, public readonly url: string) {
    super(`HTTP ${status}: ${statusText}`)
    this.name = 'HttpError'
    Object.setPrototypeOf(this, HttpError.prototype)
  }
}

/** Thin fetch wrapper for mockability at the L1 boundary. */
export async function fetchText(url: string, options?: RequestInit): Promise<string> {
  const response = await fetch(url, options)
  if (!response.ok) throw new HttpError(response.status, response.statusText, url)
  return response.text()
}
