import { createApp } from './app';
import { loadConfig } from './config/launchConfig';
import { LaunchBoard } from './display/launchBoard';
import { createLaunchTracker } from './engine/launchTracker';
import { createLaunchSource } from './launches/createLaunchSource';
import { errorMessage, logError, logInfo } from './observability/logger';
import { createTimerScheduler } from './scheduling/hostScheduler';
import { createLaunchStateStore } from './state/launchStateStore';

const config = loadConfig();

const board = new LaunchBoard();
const store = createLaunchStateStore(config.redisUrl);
const tracker = createLaunchTracker({
  source: createLaunchSource(config.source),
  store,
  sink: board,
  scheduler: createTimerScheduler(),
  timeZone: config.timeZone,
  display: config.display,
  statusRetry: config.statusRetry
});

const app = createApp(tracker, board);

const server = app.listen(config.port, () => {
  logInfo('api_server_started', {
    port: config.port,
    source: config.source.kind,
    timeZone: config.timeZone,
    store: store.backend
  });
});

tracker.start().catch((err: unknown) => {
  logError('launch_tracker_start_failed', { error: errorMessage(err) });
});

function shutdown(signal: string): void {
  logInfo('api_server_stopping', { signal });
  tracker.stop();
  server.close();
  store.close().catch((err: unknown) => {
    logError('launch_state_close_failed', { error: errorMessage(err) });
  });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
