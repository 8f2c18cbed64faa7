/**
 * @wharf/lambda-runtime
 *
 * The runtime that runs inside the deployed function: a Lambda runtime API
 * client, the poller that feeds invocations to the signed actor, and the
 * `awslambda:runtime` capability provider that owns the pollers.
 */

export type { AlbRequest, AlbResponse } from './alb.js';
export { AlbRequestSchema, parseAlbRequest, toAlbResponse, toHttpRequest } from './alb.js';
export type { StartRuntimeOptions } from './bootstrap.js';
export { startRuntime } from './bootstrap.js';
export type { InvocationClient, InvocationEvent, RuntimeClientOptions } from './client.js';
export { API_VERSION, RUNTIME_VERSION, RuntimeClient, USER_AGENT } from './client.js';
export type {
  CapabilityConfiguration,
  HttpRequest,
  HttpResponse,
  LambdaEvent,
  LambdaResponse,
} from './codec.js';
export {
  CapabilityConfigurationSchema,
  decodeMessage,
  encodeCapabilityConfiguration,
  encodeHttpRequest,
  encodeHttpResponse,
  encodeLambdaEvent,
  encodeLambdaResponse,
  HttpRequestSchema,
  HttpResponseSchema,
  LambdaEventSchema,
  LambdaResponseSchema,
  OP_BIND_ACTOR,
  OP_HANDLE_EVENT,
  OP_HANDLE_REQUEST,
  OP_REMOVE_ACTOR,
} from './codec.js';
export type { RuntimeLog, RuntimeLogLevel } from './log.js';
export { ConsoleRuntimeLog, errorMessage, LOG_LEVELS } from './log.js';
export type { Dispatcher, PollerOptions } from './poller.js';
export { NULL_DISPATCHER, Poller, TRACE_ID_VARIABLE } from './poller.js';
export type { CapabilityProvider, LambdaRuntimeProviderOptions } from './runtime-provider.js';
export { CAPABILITY_ID, LambdaRuntimeProvider, SYSTEM_ACTOR } from './runtime-provider.js';
export type { FunctionSettings } from './settings.js';
export { FunctionSettingsSchema, loadFunctionSettings } from './settings.js';
