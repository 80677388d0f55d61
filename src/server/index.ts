export { createControlApp, startControlServer } from './control-server'
export type { ControlServerOptions } from './control-server'
export { checkOrigin, createControlHandlers, errorResponse, DEFAULT_ERROR_LIMIT } from './control-handlers'
export type { ControlHandlers, HandlerResponse } from './control-handlers'
