export { getDefaultTaxRate, isDevelopment, resetEnvCache } from './config.js';
