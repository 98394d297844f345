export type {
  ILLMGateway,
  ChatMessage,
  ExecuteOptions,
  GatewayRequest,
  GatewayResult,
  RawError,
  RawErrorKind,
  RawResponse,
} from './ILLMGateway.js';
export { OpenRouterGateway } from './OpenRouterGateway.js';
export type { DispatchLogEvent, ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { isLevelEnabled, isLogLevel } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
