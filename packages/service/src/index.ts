export { SwitchyardService } from './switchyard-service.js'
export { SwitchyardHonoServer, switchyardHonoServer } from './switchyard-hono-server.js'
export type {
  ISwitchyardService,
  ManagedService,
  ServiceInfo,
  ServiceState,
  SwitchyardServiceOptions,
} from './types.js'
export type { SwitchyardHonoServerOptions } from './switchyard-hono-server.js'
