import pino from 'pino';

// stdout belongs to the CLI's scenario list, so log lines go to stderr.
export const logger = pino(
  {
    name: 'git-changed',
    level: process.env['GIT_CHANGED_LOG_LEVEL'] ?? process.env['LOG_LEVEL'] ?? 'info',
  },
  pino.destination(2)
);
