import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { configValidationSchema } from '../../config/config.schema';

export const DEFAULT_CONFIG_PATH = './config.yaml';

export function configPath(): string {
  return process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
}

export function readConfigFile(file: string = configPath()): unknown {
  return yaml.load(fs.readFileSync(file, 'utf8'));
}

export default () => {
  const parsed = readConfigFile();

  const { error, value } = configValidationSchema.validate(parsed, {
    abortEarly: false,
  });

  if (error) {
    console.error('Config validation error:\n', error.message);
    process.exit(1);
  }

  return value;
};
