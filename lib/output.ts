import type { Batch } from './types';
import type { PostProcessor } from './postProcessor';
import { incEmitted } from './metrics';

export interface OutputOptions {
  /** Write names as their batch arrives, without deduplication. */
  flush: boolean;
  write: (line: string) => void;
}

/**
 * Drain the batch stream through the post-processor and write the names.
 * Buffered mode keeps a set for the whole run and writes each name once at the end.
 * Returns the number of lines written.
 */
export async function writeResults(
  stream: AsyncIterable<Batch>,
  processor: PostProcessor,
  opts: OutputOptions,
): Promise<number> {
  const seen = new Set<string>();
  let written = 0;
  const emit = (name: string) => {
    opts.write(name);
    written++;
  };

  for await (const batch of stream) {
    for (const name of processor.clean(batch)) {
      if (opts.flush) emit(name);
      else seen.add(name);
    }
  }

  for (const name of seen) emit(name);
  incEmitted(written);
  return written;
}

export default writeResults;
