export { startActivityListener, sourceOf } from './activity-listener.js';
export type {
  ActivityListener,
  ListenerConnection,
  ListenerMessage,
} from './activity-listener.js';
