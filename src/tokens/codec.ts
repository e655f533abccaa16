import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { getNow, nowSeconds } from '../shared/clock';
import { AuthError } from '../shared/errors';
import { CredentialClaims } from '../shared/types';

const ALGORITHM = 'HS256';

export interface CodecOptions {
  secret: string;
  issuer: string;
}

export interface EncodeInput {
  sub: string;
  tenantId: string;
  exp: number;
  iat?: number;
  jti?: string;
}

/**
 * Signs and verifies bearer credentials. Stateless: whether a credential was
 * revoked is the revocation store's business, not ours.
 */
export class CredentialCodec {
  private readonly secret: Uint8Array;
  private readonly issuer: string;

  constructor(options: CodecOptions) {
    if (!options.secret) {
      throw new Error('Credential codec requires a signing secret');
    }
    this.secret = new TextEncoder().encode(options.secret);
    this.issuer = options.issuer;
  }

  async encode(input: EncodeInput): Promise<{ token: string; claims: CredentialClaims }> {
    const claims: CredentialClaims = {
      sub: input.sub,
      tenantId: input.tenantId,
      exp: input.exp,
      iat: input.iat ?? nowSeconds(),
      // Fresh jti per call, so identical inputs never produce the same token
      jti: input.jti ?? uuidv4(),
    };

    const token = await new jose.SignJWT({ tenant_id: claims.tenantId })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(claims.sub)
      .setJti(claims.jti)
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .setIssuer(this.issuer)
      .sign(this.secret);

    return { token, claims };
  }

  async decode(token: string): Promise<CredentialClaims> {
    // Check the header before verification so alg=none and friends never
    // reach the verifier
    const parts = token.split('.');
    if (parts.length !== 3) {
      throw new AuthError('MALFORMED', 'Invalid token format');
    }

    let header: unknown;
    try {
      header = JSON.parse(Buffer.from(parts[0], 'base64url').toString());
    } catch {
      throw new AuthError('MALFORMED', 'Invalid token header');
    }

    if (typeof header !== 'object' || header === null || !('alg' in header) || header.alg !== ALGORITHM) {
      throw new AuthError('MALFORMED', 'Unexpected algorithm');
    }

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.secret, {
        algorithms: [ALGORITHM],
        issuer: this.issuer,
        currentDate: getNow(),
      }));
    } catch (error) {
      throw toCodecError(error);
    }

    return readClaims(payload);
  }
}

function toCodecError(error: unknown): AuthError {
  if (error instanceof jose.errors.JWTExpired) {
    return new AuthError('EXPIRED');
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return new AuthError('SIGNATURE_INVALID');
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    return new AuthError('MALFORMED', 'Invalid token claims');
  }
  return new AuthError('MALFORMED', 'Invalid token');
}

function readClaims(payload: jose.JWTPayload): CredentialClaims {
  const { sub, exp, iat, jti } = payload;
  const tenantId = payload.tenant_id;

  if (typeof sub !== 'string' || sub.length === 0) {
    throw new AuthError('MALFORMED', 'Missing required claim: sub');
  }
  if (typeof tenantId !== 'string' || tenantId.length === 0) {
    throw new AuthError('MALFORMED', 'Missing required claim: tenant_id');
  }
  if (typeof exp !== 'number') {
    throw new AuthError('MALFORMED', 'Missing required claim: exp');
  }
  if (typeof jti !== 'string' || jti.length === 0) {
    throw new AuthError('MALFORMED', 'Missing required claim: jti');
  }

  return { sub, tenantId, exp, iat: typeof iat === 'number' ? iat : 0, jti };
}
