export { createLogger, sanitize, isPiiKey, type SafeLogger, type LoggerOptions } from './logger';
export { AppError, ErrorCode, wsCloseCodeFor } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type JwtConfig,
  type GatewayConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  JwtConfigSchema,
  GatewayConfigSchema,
} from './config';
export { JoseTokenService, type TokenServiceConfig } from './auth/token-service';
