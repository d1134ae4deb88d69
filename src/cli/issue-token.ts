// =============================================================================
// CASE EVALUATION — Development Token Tool
//
// Prints a bearer token for a caller ID, signed with JWT_SECRET. Stands
// in for the identity provider in local runs.
//
// Usage:
//   npm run token -- <callerId> [expirySeconds]
// =============================================================================

import { signAccessToken } from '../middleware/authenticate';

if (require.main === module) {
  const [callerId, expiry] = process.argv.slice(2);
  if (!callerId) {
    console.error('Usage: npm run token -- <callerId> [expirySeconds]');
    process.exit(2);
  }
  const expirySeconds = expiry ? parseInt(expiry, 10) : undefined;
  console.log(signAccessToken(callerId, expirySeconds));
}
