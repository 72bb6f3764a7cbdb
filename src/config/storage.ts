// src/config/storage.ts

import path from 'path';

export const STORAGE_PATHS = {
    config: {
        settings: path.join(process.cwd(), 'config', 'config.json'),
        env: path.join(process.cwd(), 'config', '.env')
    },
    logs: {
        app: path.join(process.cwd(), 'logs', 'app.log'),
        error: path.join(process.cwd(), 'logs', 'error.log')
    }
};

export const ARCHIVE_FORMAT = {
    timestamp: 'YYYYMMDD_HHmmss',
    jsonIndent: 2,
    sidecarRule: '='.repeat(80)
};

export const HISTORY_DEFAULTS = {
    maxEntries: 50
};
