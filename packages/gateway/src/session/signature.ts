import { createHmac } from 'node:crypto';

/** Hex HMAC-SHA1 of the login challenge keyed by the application token. */
export const signChallenge = (appToken: string, challenge: string) =>
  createHmac('sha1', appToken).update(challenge).digest('hex');
