/**
 * Runtime Layer
 *
 * Process lifecycle: startup hooks, graceful shutdown and signal handling.
 */

export {
  Lifecycle,
  type LifecycleHook,
  type LifecycleEvents,
  type LifecycleOptions,
} from './lifecycle.ts';
