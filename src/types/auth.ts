// =============================================================================
// CASE EVALUATION — Authentication Types
// =============================================================================

/** Claims carried by an access token issued by the identity provider */
export interface AccessTokenClaims {
  /** Caller ID: equals the profile ID */
  sub: string;
  /** Token ID */
  jti: string;
  /** Issued at (epoch seconds) */
  iat: number;
  /** Expires at (epoch seconds) */
  exp: number;
}

/**
 * Resolved caller identity attached to each request.
 * Role is deliberately absent: it is looked up per operation.
 */
export interface Caller {
  id: string;
  tokenId: string;
}
