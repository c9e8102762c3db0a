import { jwtVerify, type JWTPayload } from 'jose';
import { getConfig } from '../config/index.js';

function getSecretKey(): Uint8Array {
  return new TextEncoder().encode(getConfig().JWT_SECRET);
}

/** Verifies an HS256 bearer token; null when the signature, expiry or algorithm is wrong. */
export async function verifyJwt(token: string): Promise<JWTPayload | null> {
  try {
    const { payload } = await jwtVerify(token, getSecretKey(), { algorithms: ['HS256'] });
    return payload;
  } catch {
    return null;
  }
}
