import { configSchema } from './schema';
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

dotenv.config();

// An explicit CONFIG_FILE must exist; the bundled default is optional
const explicitFile = process.env.CONFIG_FILE;
const configPath = path.resolve(process.cwd(), explicitFile || './config/default.json');

if (fs.existsSync(configPath)) {
  configSchema.loadFile(configPath);
} else if (explicitFile) {
  throw new Error(`Config file ${configPath} does not exist`);
} else {
  console.warn(`No config file at ${configPath}, using defaults and env vars`);
}

// Unknown keys in the file are an error
configSchema.validate({ allowed: 'strict' });

export const config = configSchema.getProperties();

export { configSchema };
export type { MonitorConfig } from './schema';
export { buildMonitoringSettings } from './settings';
export type { MonitoringSettings, AnomalySettings } from './settings';
