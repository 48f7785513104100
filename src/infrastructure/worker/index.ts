export { StreamSupervisor, backoffDelay } from './stream-supervisor.js';
export type {
  SupervisorDeps,
  SupervisorState,
  SupervisorStatus,
  ReconnectPolicy,
} from './stream-supervisor.js';
