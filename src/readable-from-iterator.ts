const BUFFER_SIZE = 16 * 1024; // 16 KB

/**
 * Helper for creating a ReadableStream from an iterator of byte chunks. The
 * iterator is only advanced when the consumer pulls, so work done to produce
 * each chunk is deferred until it is needed.
 *
 * @param iterator The source of chunks
 */
export function readableFromIterator(
  iterator: Iterator<Uint8Array, void>
): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>(
    {
      pull(controller) {
        // Anything thrown by the iterator errors the stream
        const result = iterator.next();
        if (result.done) {
          controller.close();
          return;
        }
        controller.enqueue(result.value);
      },
      cancel() {
        iterator.return?.();
      },
    },
    new ByteLengthQueuingStrategy({ highWaterMark: BUFFER_SIZE })
  );
}
