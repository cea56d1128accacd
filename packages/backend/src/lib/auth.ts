import crypto from 'crypto';

export function hash_api_key(key: string): string {
  return crypto.createHash('sha256').update(key).digest('hex');
}

export function constant_time_compare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(Buffer.from(a), Buffer.from(b));
}
