// The siphash package ships no type declarations.
declare module 'siphash' {
  interface SipHashResult {
    h: number;
    l: number;
  }

  const SipHash: {
    hash(key: readonly number[], message: string | Uint8Array): SipHashResult;
    hash_hex(key: readonly number[], message: string | Uint8Array): string;
    hash_uint(key: readonly number[], message: string | Uint8Array): number;
    string16_to_key(text: string): number[];
  };

  export default SipHash;
}
