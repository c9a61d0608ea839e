const REFERENCE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

/** Human-quotable booking reference, e.g. APT-7KQ2XM. */
export function generateReferenceCode(): string {
  let code = 'APT-';
  for (let i = 0; i < 6; i++) {
    code += REFERENCE_ALPHABET.charAt(Math.floor(Math.random() * REFERENCE_ALPHABET.length));
  }
  return code;
}
