import { createLogger, setDefaultLogger } from '../utils/logger.js';

// Silent logger for every suite; the default one starts a pino-pretty worker.
setDefaultLogger(createLogger({ level: 'fatal' }));
