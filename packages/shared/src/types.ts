/** Ordered, order-significant list of opaque byte blobs. */
export type BlobList = Uint8Array[];

export interface DecodeOptions {
  /**
   * What to do with elements whose payload is empty or absent. Existing services write
   * nothing for them, so the default `"drop"` leaves them out of the result.
   */
  emptyBlobs?: "drop" | "keep";
}

export interface ErrorEnvelope {
  code: string;
  message: string;
  remediation?: string;
  details?: Record<string, unknown>;
}
