import fetch, { type RequestInit, type Response } from 'node-fetch';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = fetch;
