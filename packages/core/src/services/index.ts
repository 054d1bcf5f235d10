export {
  type ILogService,
  type LogLevel,
  type LogServiceOptions,
  LogService,
  createLogService,
  isLogLevel,
} from './log-service.js';
export { getLog, getRootLog, setLogService, resetLogService } from './get-log.js';
export { getErrorMessage } from './error-utils.js';
