import { loadConfig, type EnvSource, type MonitorConfig } from "./config/env.js";
import { ConfigError } from "./domain/errors.js";
import { createCycleSettings, MonitorService } from "./services/monitor-service.js";
import { FileBackedMonitorStateStore } from "./services/monitor-state.js";
import { TelegramNotifier } from "./services/notifier.js";
import { HttpPageFetcher } from "./services/page-fetcher.js";
import { logger, setLogLevel } from "./utils/logger.js";

export type MonitorServiceFactory = (config: MonitorConfig) => MonitorService;

export function createMonitorService(config: MonitorConfig): MonitorService {
  return new MonitorService({
    settings: createCycleSettings(config),
    fetcher: new HttpPageFetcher({ timeoutMs: config.requestTimeoutMs, userAgent: config.userAgent }),
    notifier: new TelegramNotifier({
      botToken: config.telegram.botToken,
      apiBaseUrl: config.telegram.apiBaseUrl,
      timeoutMs: config.notifyTimeoutMs,
      quietDestinations: [config.telegram.ownerChatId],
    }),
    stateStore: new FileBackedMonitorStateStore(config.stateFile),
  });
}

/**
 * One monitoring cycle. Resolves to the process exit code: 1 only when the
 * configuration is unusable. Everything after start-up is recorded by the
 * cycle itself and exits 0.
 */
export async function runCli(
  source: EnvSource = process.env,
  createService: MonitorServiceFactory = createMonitorService,
): Promise<number> {
  let config: MonitorConfig;
  try {
    config = loadConfig(source);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("config_invalid", { issues: error.issues });
      return 1;
    }
    throw error;
  }

  setLogLevel(config.logLevel);
  await createService(config).runCycle();
  return 0;
}
