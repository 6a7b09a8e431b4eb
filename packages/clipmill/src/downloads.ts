import { createHmac, timingSafeEqual } from 'node:crypto';
import { ForbiddenError } from './errors.js';

export interface SignedDownload {
  expires: number;
  signature: string;
}

export class DownloadLinks {
  sign(token: string, secret: string, expiresAt: number): SignedDownload {
    return {
      expires: expiresAt,
      signature: this.digest(token, expiresAt, secret),
    };
  }

  toQuery(signed: SignedDownload): string {
    return `expires=${signed.expires}&signature=${signed.signature}`;
  }

  /**
   * Throws ForbiddenError unless `query` carries an unexpired signature for
   * `token`. `now` is in unix seconds.
   */
  verify(
    token: string,
    query: { expires?: unknown; signature?: unknown },
    secret: string,
    now: number = Math.floor(Date.now() / 1000),
  ): void {
    if (typeof query.expires !== 'string' || typeof query.signature !== 'string') {
      throw new ForbiddenError('Download link is missing its signature', 'DOWNLOAD_LINK_INVALID');
    }

    const expires = Number.parseInt(query.expires, 10);
    if (!Number.isFinite(expires)) {
      throw new ForbiddenError('Download link has an invalid expiry', 'DOWNLOAD_LINK_INVALID');
    }

    if (!this.secureCompare(query.signature, this.digest(token, expires, secret))) {
      throw new ForbiddenError('Download link signature does not match', 'DOWNLOAD_LINK_INVALID');
    }

    if (now > expires) {
      throw new ForbiddenError('Download link has expired', 'DOWNLOAD_LINK_EXPIRED');
    }
  }

  private digest(token: string, expires: number, secret: string): string {
    return createHmac('sha256', secret).update(`${expires}.${token}`).digest('hex');
  }

  private secureCompare(a: string, b: string): boolean {
    if (a.length !== b.length) return false;
    return timingSafeEqual(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
  }
}
