export { registerVerifyCommand } from './verify';
export { registerCheckCommand } from './check';
export type { CliState, GlobalOptions } from './context';
