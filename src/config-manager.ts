import { loadConfig, type ServerConfig } from './config.js';
import { setLogLevel } from './utils/logger.js';

/**
 * Holds the configuration the running server was started with
 */
class ConfigManager {
    private config: ServerConfig | null = null;

    loadConfig(argv: readonly string[]): ServerConfig {
        return this.setConfig(loadConfig(argv));
    }

    setConfig(config: ServerConfig): ServerConfig {
        this.config = { ...config };
        setLogLevel(config.logLevel);
        return this.config;
    }

    getConfig(): ServerConfig {
        if (!this.config) {
            throw new Error('Configuration has not been loaded');
        }
        return this.config;
    }
}

export const configManager = new ConfigManager();
