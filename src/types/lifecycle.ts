export type ShutdownListener = () => void | Promise<void>;

/**
 * Host hook for application shutdown.
 */
export interface HostLifecycle {
  onShutdown(listener: ShutdownListener): void;
}
