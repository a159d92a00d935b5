import type { BackendConfig } from '@synaptic/shared';
import { InMemoryVectorBackend } from './memory.js';
import { LanceDbVectorBackend } from './lancedb.js';
import type { VectorBackendClient } from './types.js';

export function createVectorBackend(config: BackendConfig): VectorBackendClient {
  switch (config.kind) {
    case 'memory':
      return new InMemoryVectorBackend();
    case 'lancedb':
      return new LanceDbVectorBackend({ uri: config.lancedbPath, indexedFields: config.indexedFields });
  }
}
