import pino from 'pino';

// stdout carries the notebook's own output, so logs go to stderr.
const logger = pino(
  {
    name: 'notebook',
    level: process.env.LOG_LEVEL || 'info',
  },
  pino.destination(2)
);

export default logger;
