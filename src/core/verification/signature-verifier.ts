import * as crypto from 'crypto';

const HEX_DIGEST_PATTERN = /^[0-9a-f]+$/;

/**
 * HMAC-SHA256 webhook signature verification.
 *
 * The signature is the lowercase hex digest of the exact request bytes,
 * keyed by the shared secret.
 */
export class SignatureVerifier {
  static readonly ALGORITHM = 'sha256';

  /**
   * Returns false for a missing or malformed signature and for an empty
   * secret. Never throws.
   */
  verify(
    rawBody: Buffer,
    providedSignature: string | undefined,
    secret: string,
  ): boolean {
    if (!secret || !providedSignature) {
      return false;
    }

    if (!HEX_DIGEST_PATTERN.test(providedSignature)) {
      return false;
    }

    return this.timingSafeEqual(this.sign(rawBody, secret), providedSignature);
  }

  /**
   * Compute the signature a sender would attach to this body
   */
  sign(rawBody: Buffer, secret: string): string {
    return crypto
      .createHmac(SignatureVerifier.ALGORITHM, secret)
      .update(rawBody)
      .digest('hex');
  }

  /**
   * Timing-safe string comparison
   */
  private timingSafeEqual(a: string, b: string): boolean {
    const bufferA = Buffer.from(a);
    const bufferB = Buffer.from(b);

    if (bufferA.length !== bufferB.length) {
      return false;
    }

    return crypto.timingSafeEqual(bufferA, bufferB);
  }
}
