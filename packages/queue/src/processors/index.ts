export { BlockchainEventsProcessor, blockchainEventsProcessor } from './blockchain-events.processor.js';
export type { BlockchainEventJob } from './blockchain-events.processor.js';
export { initializeAllProcessors, startWorkerProcess } from './initialize.js';
export type { ProcessorOptions } from './initialize.js';
