export { ioErrorHandler, toIoError, errorCommands } from './error.handler';
