import { createLogger, type ParseFailureCounters, type RecordKind } from '@synaptic/shared';
import type { DecodeResult } from './codecs.js';
import type { RetrievedPoint } from './backends/types.js';

const log = createLogger('store');

/** Counts stored points that could not be decoded and were skipped. */
export class ParseFailureTracker {
  private counters: ParseFailureCounters = { thought: 0, relation: 0, result: 0 };

  /** Decodes each point, skipping and counting the ones that fail. */
  decodeAll<T>(kind: RecordKind, points: RetrievedPoint[], decode: (raw: unknown) => DecodeResult<T>): T[] {
    const values: T[] = [];
    for (const point of points) {
      const decoded = decode(point.payload);
      if (decoded.ok) {
        values.push(decoded.value);
      } else {
        this.counters[kind]++;
        log.warn(`Skipping unparseable ${kind} point ${point.id}: ${decoded.error}`);
      }
    }
    return values;
  }

  snapshot(): ParseFailureCounters {
    return { ...this.counters };
  }
}
