export { createFetchTransport, createHandlerTransport } from './fetch-transport';
export type { FetchLike, RequestHandler, Transport } from './types';
