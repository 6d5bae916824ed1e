import { Config } from './types.js';

const TEN_GIB = 10 * 1024 * 1024 * 1024;
const LOG_LEVELS: ReadonlyArray<Config['logging']['level']> = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(value: string | undefined): Config['logging']['level'] {
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private readonly config: Config;

  private constructor() {
    this.config = this.loadConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Drop the cached instance so the next call re-reads the environment.
   */
  public static reset(): void {
    ConfigManager.instance = undefined;
  }

  public getConfig(): Config {
    return this.config;
  }

  private loadConfig(): Config {
    return {
      transfer: {
        maxDeclaredSize: parseInt(process.env.TRANSFER_MAX_SIZE ?? String(TEN_GIB), 10),
        connectTimeout: parseInt(process.env.TRANSFER_CONNECT_TIMEOUT ?? '30000', 10),
        userAgent: process.env.TRANSFER_USER_AGENT ?? 'resumable-transfer/1.0',
      },
      probe: {
        timeout: parseInt(process.env.PROBE_TIMEOUT ?? '5000', 10),
        forbiddenIsReachable: process.env.PROBE_FORBIDDEN_REACHABLE !== 'false',
      },
      media: {
        binary: process.env.YTDLP_PATH ?? 'yt-dlp',
        defaultQuality: process.env.MEDIA_QUALITY ?? 'best',
        outputTemplate: '%(title)s.%(ext)s',
      },
      paths: {
        downloadsDir: process.env.DOWNLOAD_DIR ?? process.cwd(),
      },
      logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
        file: process.env.LOG_FILE,
      },
    };
  }
}

// Export singleton instance getter
export const getConfig = (): Config => ConfigManager.getInstance().getConfig();
