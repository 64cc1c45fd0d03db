export { createIoController, isLivenessProbe, methodNotAllowed } from './io.controller';
