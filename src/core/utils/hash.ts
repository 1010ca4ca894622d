import xxhash from "xxhash-wasm";

type Hasher = Awaited<ReturnType<typeof xxhash>>;

let hasher: Promise<Hasher> | null = null;

function getHasher(): Promise<Hasher> {
  // The wasm module is instantiated once per process and shared by every worker.
  if (!hasher) hasher = xxhash();
  return hasher;
}

/**
 * Fast non-cryptographic 64-bit digest of the given bytes, as lowercase hex
 * without leading zeros. Identical bytes always give the identical digest.
 */
export async function contentHash(bytes: Uint8Array | string): Promise<string> {
  const { h64Raw } = await getHasher();
  const input = typeof bytes === "string" ? Buffer.from(bytes, "utf8") : bytes;
  return h64Raw(input).toString(16);
}
