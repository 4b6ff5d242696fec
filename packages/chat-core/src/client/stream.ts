import type { Duplex } from "node:stream";

/**
 * The connection the client runs over. `read` resolves to the next chunk, or
 * null at end of stream; `write` resolves once the chunk has been handed off.
 */
export type ByteStream = {
  read(): Promise<Uint8Array | null>;
  write(chunk: Uint8Array): Promise<void>;
};

/** Adapts a Node duplex (a `net.Socket`, a `tls.TLSSocket`) to a ByteStream. */
export const fromDuplex = (duplex: Duplex): ByteStream => {
  const chunks: AsyncIterator<unknown> = duplex[Symbol.asyncIterator]();

  return {
    async read() {
      const next = await chunks.next();
      if (next.done) return null;
      const { value } = next;
      if (value instanceof Uint8Array) return value;
      if (typeof value === "string") return Buffer.from(value, "utf8");
      throw new TypeError("Stream produced a chunk that is neither bytes nor text.");
    },
    write(chunk) {
      return new Promise<void>((resolve, reject) => {
        duplex.write(chunk, (error) => (error ? reject(error) : resolve()));
      });
    }
  };
};
