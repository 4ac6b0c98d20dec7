/**
 * Derivation layer: values that are not in the GraphML document but must be
 * the same for every generator.
 */

export {
  TOPOLOGY_DEFAULTS,
  DEFAULT_DATARATE,
  DEFAULT_DELAY,
  readAttribute,
  edgeDatarate,
  edgeDelay,
  edgeNetwork,
  nodeDisplayName
} from "./defaults";
export { parseDelay, formatDelay } from "./delay";
export type { DelayUnit, NormalizedDelay } from "./delay";
export {
  BASE_PORT,
  networkBase,
  synthesizeAddress,
  synthesizePort,
  formatListenEndpoint
} from "./address";
export type { TransportProtocol } from "./address";
export { nodeIdentity, DEFAULT_IDENTITY_NAMESPACE } from "./identity";
export {
  endpointRole,
  tapDeviceFor,
  deriveEndpoint,
  deriveEdgeEndpoints,
  deriveNodeEndpoints
} from "./endpoints";
export type { EndpointRole, DerivedEndpoint } from "./endpoints";
