import fetch, { RequestInit, Response } from 'node-fetch';

// The subset of fetch the clients use; tests pass an in-process fake
export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: HttpFetch = (url, init) => fetch(url, init);

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
