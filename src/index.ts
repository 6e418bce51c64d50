/**
 * wechat-article-converter - Markdown/HTML to WeChat article converter
 */

// High-level conversion API
export { convert } from './converter';

// Types
export type { ConvertOptions } from './types';

// Core module re-exports
export * from './core/index';

// Publishing
export * from './wechat-api/index';

// Configuration
export { loadConfig, parseEnvFile, findEnvFile, ConfigError, DEFAULT_CONFIG } from './config';
export type { AppConfig, LoadConfigOptions } from './config';
