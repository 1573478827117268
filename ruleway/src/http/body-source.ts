import { BodyConsumedError } from "../errors.ts";
import type { BodySource } from "../types.ts";

const encoder = new TextEncoder();

/** Body over bytes already in memory. */
export function bufferBody(content: Uint8Array | string): BodySource {
	const bytes = typeof content === "string" ? encoder.encode(content) : content;
	let consumed = false;
	return {
		async read(limit: number): Promise<Uint8Array> {
			if (consumed) throw new BodyConsumedError();
			consumed = true;
			return bytes.subarray(0, Math.max(0, limit));
		},
	};
}

/**
 * Body over an async byte stream (a Node IncomingMessage, a Readable, ...).
 *
 * Stops pulling once `limit` bytes are in and closes the iterator, which
 * destroys a Node Readable. The body can be read only once either way.
 */
export function streamBody(stream: AsyncIterable<Uint8Array | string>): BodySource {
	let consumed = false;
	return {
		async read(limit: number): Promise<Uint8Array> {
			if (consumed) throw new BodyConsumedError();
			consumed = true;

			const chunks: Uint8Array[] = [];
			let total = 0;
			if (limit > 0) {
				for await (const chunk of stream) {
					const bytes = typeof chunk === "string" ? encoder.encode(chunk) : chunk;
					const take = bytes.subarray(0, limit - total);
					chunks.push(take);
					total += take.length;
					if (total >= limit) break;
				}
			}

			const out = new Uint8Array(total);
			let offset = 0;
			for (const chunk of chunks) {
				out.set(chunk, offset);
				offset += chunk.length;
			}
			return out;
		},
	};
}
