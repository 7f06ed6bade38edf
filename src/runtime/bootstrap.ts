import type { DaemonConfig } from '@/domain/config/types';
import type { PlaybackAdapter } from '@/ports/PlaybackAdapterPort';
import type { LocatorCheckPort } from '@/ports/LocatorCheckPort';
import type { TrackMetadataPort } from '@/ports/TrackMetadataPort';
import { loadConfig } from '@/config';
import { PlaybackSession } from '@/application/session/PlaybackSession';
import { AuthPolicy } from '@/application/dispatch/authPolicy';
import { CommandDispatcher } from '@/application/dispatch/commandDispatcher';
import { createPlaybackAdapter } from '@/adapters/playback/factory';
import { TrackMetadataReader } from '@/adapters/metadata/trackMetadataReader';
import { HttpsLocatorChecker } from '@/adapters/remote/httpsLocatorChecker';
import { ControlServer } from '@/adapters/control/controlServer';
import { DAEMON_NAME, daemonVersion } from '@/runtime/version';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';
import { createLogger, logManager } from '@/shared/logging/logger';

const SERVICE_STOP_TIMEOUT_MS = 6000;

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export type RuntimeOptions = {
  /** Skips config loading; used as is. */
  config?: DaemonConfig;
  env?: NodeJS.ProcessEnv;
  /** Replaces the configured backend. */
  adapter?: PlaybackAdapter;
  metadata?: TrackMetadataPort;
  locatorCheck?: LocatorCheckPort;
  stopTimeoutMs?: number;
};

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const log = createLogger('Server');
  let session: PlaybackSession | null = null;
  let controlServer: ControlServer | null = null;

  async function startServices(): Promise<void> {
    const config = options.config ?? (await loadConfig({ env: options.env }));
    logManager.configure({ level: config.logging.level, json: config.logging.json });
    log.info('starting', { name: DAEMON_NAME, version: daemonVersion(), backend: config.adapter.kind });

    const adapter = options.adapter ?? createPlaybackAdapter(config.adapter);
    const metadata =
      options.metadata ?? (config.playback.probeMetadata ? new TrackMetadataReader() : undefined);
    const locatorCheck =
      options.locatorCheck ?? (config.playback.validateHttps ? new HttpsLocatorChecker() : undefined);
    session = new PlaybackSession({
      adapter,
      metadata,
      locatorCheck,
      allowInsecureHttp: config.playback.allowInsecureHttp,
    });
    await session.start();

    const auth = new AuthPolicy(config.auth);
    if (!auth.enabled) {
      log.warn('no auth token configured; any local user with socket access can control playback');
    }
    const dispatcher = new CommandDispatcher({
      session,
      auth,
      server: { name: DAEMON_NAME, version: daemonVersion() },
    });
    controlServer = new ControlServer({
      ...config.protocol,
      socketPath: config.socketPath,
      dispatcher,
    });
    try {
      await controlServer.start();
    } catch (error) {
      controlServer = null;
      await session.shutdown();
      session = null;
      throw error;
    }

    log.info('startup complete', { socketPath: config.socketPath, authMode: auth.enabled ? auth.mode : 'off' });
  }

  /**
   * Stops in dependency order: no new clients, then the session drains and
   * releases the backend, then the remaining clients and the socket go.
   */
  async function stopServices(): Promise<void> {
    const timeoutMs = options.stopTimeoutMs ?? SERVICE_STOP_TIMEOUT_MS;
    const server = controlServer;
    const activeSession = session;
    server?.stopAccepting();

    const services: LifecycleService[] = [];
    if (activeSession) {
      services.push({ name: 'playback-session', stop: () => activeSession.shutdown() });
    }
    if (server) {
      services.push({ name: 'control-server', stop: () => server.stop() });
    }
    for (const service of services) {
      await stopWithTimeout(service.name, service.stop, timeoutMs, log);
    }

    controlServer = null;
    session = null;
  }

  return {
    start: startServices,
    stop: stopServices,
  };
}
