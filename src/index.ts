export { AgentClient, AgentMessage, SignFlags } from './agent/client.js'
export { AGENT_SOCKET_ENV, connectAgent, resolveAgentSocket, type ConnectAgentOptions } from './agent/connection.js'
export type { AgentKey, AgentSignature, KeyAgent } from './agent/types.js'
export {
  AgentListError,
  AgentProtocolError,
  AgentRequestError,
  AppError,
  ConfigError,
  ConnectionError,
  KeyNotFoundError,
  SignatureDecodeError,
  SigningError,
  UnsupportedAlgorithmError,
  WireFormatError,
} from './lib/errors.js'
export { formatFingerprint, formatMd5Fingerprint, md5Fingerprint, sha256Fingerprint, stripFingerprint } from './signer/fingerprint.js'
export { formatAuthorizationHeader, type AuthorizationParams } from './signer/header.js'
export { matchKey, selectKey } from './signer/match.js'
export { AgentSigner, authorizationHeaders, PROBE_PAYLOAD, signedRequestHeaders, type AgentSignerOptions, type RequestHeaders } from './signer/service.js'
export {
  decodeSignature,
  encodeSignature,
  normalizeSignature,
  lookupSignatureFormat,
  signatureFamily,
  signatureType,
  type HttpAuthSignature,
  type NormalizedSignature,
  type SignatureFamily,
  type SignatureFormat,
} from './signer/signature.js'
