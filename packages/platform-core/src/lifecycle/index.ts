export { registerPhasedShutdownHook, setupGracefulShutdown, type ShutdownPhase } from './gracefulShutdown';
