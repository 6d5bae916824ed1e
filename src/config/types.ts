export interface Config {
  // Transfer loop settings
  transfer: {
    maxDeclaredSize: number; // bytes; declared sizes at or above this are rejected
    connectTimeout: number; // ms until response headers arrive
    userAgent: string;
  };

  // Reachability probe settings
  probe: {
    timeout: number;
    forbiddenIsReachable: boolean;
  };

  // External media downloader
  media: {
    binary: string;
    defaultQuality: string;
    outputTemplate: string;
  };

  // File paths
  paths: {
    downloadsDir: string;
  };

  // Logging settings
  logging: {
    level: 'error' | 'warn' | 'info' | 'debug';
    file?: string;
  };
}
