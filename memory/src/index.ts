// @tuplet/memory
// In-memory datasets and the reference `memory` gateway

import { adapters } from '@tuplet/core';
import { MemoryGateway } from './gateway.js';

export { MemoryDataset, type JoinKeys } from './dataset.js';
export { Storage, type StorageSnapshot } from './storage.js';
export { MemoryGateway, type MemoryGatewayOptions } from './gateway.js';
export { MemoryTransactionRunner } from './transaction.js';
export { inferSchema, inferType } from './inference.js';

adapters.register(MemoryGateway.adapter, { Gateway: MemoryGateway });
