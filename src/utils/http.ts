/** The part of the global fetch the HTTP clients use; swapped out in tests */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}
