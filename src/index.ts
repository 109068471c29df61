export * from './features/navigator'
export { NavigatorError, type NavigatorErrorCode, getErrorMessage, normalizeError } from './shared/lib/error'
export { createPowerShellRunner, type CommandOutput, type CommandRunner } from './shared/lib/shell'
