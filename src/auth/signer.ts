/**
 * RS256 signing capability used for self-signed JWTs
 */

import { SignJWT, importPKCS8, type JWTPayload as JoseClaims } from "jose";

export const JWT_ALGORITHM = "RS256";

export interface SignOptions {
  keyId?: string;
}

/**
 * Narrow signing interface so tests can substitute a deterministic fake.
 * Implementations throw on malformed key material.
 */
export interface Signer {
  readonly algorithm: typeof JWT_ALGORITHM;
  sign(claims: JoseClaims, privateKeyPem: string, options?: SignOptions): Promise<string>;
}

/**
 * Signs with a PKCS#8 PEM private key (the format found in service account key files)
 */
export class JoseSigner implements Signer {
  readonly algorithm = JWT_ALGORITHM;

  async sign(claims: JoseClaims, privateKeyPem: string, options: SignOptions = {}): Promise<string> {
    const key = await importPKCS8(privateKeyPem, JWT_ALGORITHM);

    return new SignJWT(claims)
      .setProtectedHeader({
        alg: JWT_ALGORITHM,
        typ: "JWT",
        ...(options.keyId ? { kid: options.keyId } : {}),
      })
      .sign(key);
  }
}
