export type { Logger } from './types';
export { ConsoleLogger, SilentLogger } from './consoleLogger';
