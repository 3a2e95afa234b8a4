/**
 * Re-slices a byte stream into chunks of exactly `chunkSize` bytes; only the
 * last chunk may be shorter. Input pieces may be any size, including empty.
 */
export async function* rechunk(source: AsyncIterable<Uint8Array>, chunkSize: number): AsyncGenerator<Uint8Array> {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new Error("chunkSize must be an integer >= 1");
  }

  let buffer = new Uint8Array(chunkSize);
  let filled = 0;

  for await (const piece of source) {
    let offset = 0;
    while (offset < piece.length) {
      const take = Math.min(chunkSize - filled, piece.length - offset);
      buffer.set(piece.subarray(offset, offset + take), filled);
      filled += take;
      offset += take;

      if (filled === chunkSize) {
        yield buffer;
        buffer = new Uint8Array(chunkSize);
        filled = 0;
      }
    }
  }

  if (filled > 0) yield buffer.subarray(0, filled);
}
