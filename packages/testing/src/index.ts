// In-memory remote
export {
  createInMemoryRemote,
  type InMemoryRemote,
  type InMemoryRemoteOptions,
  type InjectedFailure,
} from './in-memory-remote.js';

// Fault injection
export { FaultyBackend, createFaultyBackend, type FaultPoint } from './faulty-backend.js';

// Backend contract suite
export { describeBackendContract, type BackendFactory } from './backend-contract.js';
