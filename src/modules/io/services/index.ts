export { IoDispatcher } from './dispatcher.service';
