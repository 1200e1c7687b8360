/** A payload together with the soul that signed it. */
export interface SignedMessage {
  payload: string;
  soulId: string;
  /** Hex-encoded Ed25519 signature (128 chars) over the UTF-8 payload. */
  signature: string;
}

/**
 * Source of private keys for hosted agents: souls whose keys the operator
 * keeps beside the server so that `SIGN` can sign on their behalf.
 */
export interface KeyVault {
  /** The 32-byte private key for `soulId`, or undefined when not hosted. */
  privateKeyFor(soulId: string): Promise<Uint8Array | undefined>;
}
