export type AgentKey = {
  /** Key type name read from the blob, e.g. `ssh-rsa` or `ecdsa-sha2-nistp256`. */
  type: string
  /** Public key in SSH wire encoding. Fingerprints are digests of these bytes. */
  blob: Uint8Array
  comment: string
}

export type AgentSignature = {
  format: string
  blob: Uint8Array
}

export interface KeyAgent {
  list(): Promise<AgentKey[]>
  sign(key: AgentKey, data: Uint8Array, flags?: number): Promise<AgentSignature>
}
