/**
 * @llm-dispatch/logger
 */
export { createLogger, getRootLogger, type Logger } from './logger.mjs';
export { maskProxyUrl, maskValue, maskHeaders } from './mask.mjs';
