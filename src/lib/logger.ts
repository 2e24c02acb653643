
import path from 'path';

import pino, { Logger, LoggerOptions } from 'pino';

import { config } from '../config';
import { LOG_DIR_PATH } from '../constants';

const APP_LOG_FILE_NAME = 'app.log';
const APP_LOG_FILE_PATH = [
  LOG_DIR_PATH,
  APP_LOG_FILE_NAME,
].join(path.sep);

const APP_ERROR_LOG_FILE_NAME = 'app.error.log';
const APP_ERROR_LOG_FILE_PATH = [
  LOG_DIR_PATH,
  APP_ERROR_LOG_FILE_NAME,
].join(path.sep);

export const logger = initLogger();

function initLogger(): Logger {
  let opts: LoggerOptions;
  let stream = pino.multistream([
    {
      stream: pino.destination({
        dest: APP_LOG_FILE_PATH,
        mkdir: true,
      }),
      level: 'debug',
    },
    {
      stream: pino.destination({
        dest: APP_ERROR_LOG_FILE_PATH,
        mkdir: true,
      }),
      level: 'error',
    },
  ]);
  opts = {
    level: config.LOG_LEVEL,
  };
  return pino(opts, stream);
}
