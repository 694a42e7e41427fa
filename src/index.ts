export { HttpApiManager, computeRegistrationMac } from './lib/api-manager';
export type { ManagerDependencies, ManagerOptions, ManagerStrategies } from './lib/api-manager';
export { ConfigLoader, createSettings } from './lib/config-loader';
export type { ConfigFile, LoadOptions, SettingsOverrides } from './lib/config-loader';
export {
  AdminError,
  ConfigurationError,
  DendriteCliError,
  TransportError,
  ValidationError,
  describeError,
  EXIT_CODES,
} from './lib/errors';
export type { TransportErrorKind } from './lib/errors';
export { Logger, silentLogger } from './lib/logger';
export type { LogLevel } from './lib/logger';
export { NodeHttpTransport } from './lib/http-transport';
export type { AdminTransport } from './lib/http-transport';
export { ValidationService } from './lib/validation-service';
export {
  AdminUserListStrategy,
  InteractiveDeactivationStrategy,
  PublicRoomsDirectoryStrategy,
} from './lib/workarounds';
export type { AdminOperation, OperationContext } from './lib/workarounds';
export * from './types/admin-types';
export * from './types/settings';
export { createProgram } from './program';
