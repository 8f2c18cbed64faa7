/**
 * @wharf/provider-simulated
 *
 * In-process resource provider: the cloud the CLI deploys to when no real
 * provider is configured, and the stand-in every end-to-end test runs against.
 */

export type { FaultRule, ProviderAction, SimulatedProviderOptions } from './simulated-provider.js';
export { PROVIDER_NAME, SimulatedProvider } from './simulated-provider.js';
export type { CloudRecord, CloudState, TimelineEntry } from './cloud-state.js';
export { CLOUD_FILE, CloudStateSchema, emptyCloud } from './cloud-state.js';
export type { CloudErrorCode } from './errors.js';
export { CloudApiError } from './errors.js';
