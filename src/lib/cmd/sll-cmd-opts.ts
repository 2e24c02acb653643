
import type { Logger } from 'pino';

export type SllCmdOpts = {
  logFn: (line: string) => void;
  logger?: Logger;
  colors?: boolean;
};
