import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

const devFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const { service: _service, ...rest } = meta;
  return `${timestamp} [${level}]: ${message} ${Object.keys(rest).length ? JSON.stringify(rest) : ''}`;
});

export const logger = winston.createLogger({
  level: logLevel,
  defaultMeta: { service: 'draft-board-api' },
  // Keep test output readable; failures surface through assertions
  silent: nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    nodeEnv === 'production' ? winston.format.json() : devFormat
  ),
  transports: [new winston.transports.Console()],
});
