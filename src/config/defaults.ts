import type { BuildmuxConfig } from './types.js';

export const CONFIG_FILE_NAME = '.buildmux.json';

export const DEFAULT_CONFIG: BuildmuxConfig = {
  version: 1,
  process: {
    idleTimeoutMs: 300000, // 5 分鐘
    killGraceMs: 2000,
    shell: '/bin/sh',
    shellArgs: ['-c'],
  },
  backends: {
    managed: {
      executable: 'gradle',
      wrapperNames: ['gradlew'],
      defaultArgs: ['--console=plain'],
    },
    packageManager: {
      executable: 'cargo',
    },
    native: {
      executable: 'native-build',
      manifestName: 'native-build.toml',
    },
  },
  terminal: {
    logDir: '.buildmux/terminal_logs',
    historyLimit: 1000,
  },
  store: {
    dbPath: '.buildmux/commands.db',
  },
  logging: {
    level: 'info',
  },
};
