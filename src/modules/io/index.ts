/**
 * Polling Endpoint Module - Public API
 */

export { createIoServer, startIoServer, shutdownIoServer, getIoStats } from './io.server';
export type { IoServer, IoServerOptions, ResolvedIoServerOptions } from './io.server';

export { IoDispatcher } from './services';
export { createIoController, isLivenessProbe } from './controllers';
export { ioErrorHandler, toIoError } from './handlers';
export { parseClientEvent } from './utils';

export { IoError, IoErrorCode, InvalidEventError, PushTimeoutError, RequestState } from './types';
export type { IoRequest, IoResponse, IoMethod, DispatcherOptions } from './types';
