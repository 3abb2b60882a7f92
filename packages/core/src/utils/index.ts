export {
  isTimeoutReason,
  isAbortError,
  withTimeout,
  errorMessage,
} from './abort.js';
export { Mutex } from './mutex.js';
