import dotenv from 'dotenv';
import { isString } from './lib/util/validate-primitives';

dotenv.config();

const config = {
  ENVIRONMENT: getEnvironment(),
  LOG_LEVEL: getLogLevel(),
  SLL_DEBUG_ASSERT: getBoolEnvVar('SLL_DEBUG_ASSERT'),
  NO_COLOR: getEnvVar('NO_COLOR') !== undefined,
} as const;

export {
  config,
};

function getBoolEnvVar(envKey: string): boolean {
  let rawEnvVar: string | undefined;
  rawEnvVar = getEnvVar(envKey);
  if(
    (rawEnvVar === 'true')
    || (rawEnvVar === '1')
  ) {
    return true;
  }
  return false;
}

function getEnvVar(envKey: string): string | undefined {
  let rawEnvVar: string | undefined;
  rawEnvVar = process.env[envKey];
  if(!isString(rawEnvVar)) {
    return undefined;
  }
  return rawEnvVar;
}

function getEnvironment() {
  return process.env.ENVIRONMENT ?? 'development';
}

function getLogLevel(): string {
  let rawLevel: string | undefined;
  rawLevel = getEnvVar('LOG_LEVEL');
  if(rawLevel !== undefined) {
    return rawLevel;
  }
  return (getEnvironment() === 'development')
    ? 'debug'
    : 'info'
  ;
}
