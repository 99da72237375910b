import * as winston from 'winston';
import env from './env';

const applicationFormat = winston.format((info) => ({ ...info, application: env.applicationName }));

/**
 * Creates a logger that logs messages in JSON format.
 * @param transports - the transports to write to
 *
 * @returns The JSON Winston logger
 */
export function createJsonLogger(transports: winston.transport[]): winston.Logger {
  const jsonLogger = winston.createLogger({
    format: winston.format.combine(
      winston.format.timestamp(),
      applicationFormat(),
      winston.format.json(),
    ),
    transports,
  });

  return jsonLogger;
}

/**
 * Helper method that formats a value as a log tag only if it is provided
 *
 * @param tag - The tag to add
 * @returns The input in tag format, or the empty string if there is no tag
 */
function optionalTag(tag: unknown): string {
  return typeof tag === 'string' && tag ? ` [${tag}]` : '';
}

const textformat = winston.format.printf(
  (info) => {
    let message = `${info.timestamp} [${info.level}]${optionalTag(info.application)}${optionalTag(info.collectionId)}: ${info.message}`;
    if (info.stack) message += `\n${info.stack}`;
    return message;
  },
);

/**
 * Creates a logger that logs messages as a text string. Useful when viewing
 * logs via a terminal.
 * @param transports - the transports to write to
 *
 * @returns The text string Winston logger
 */
export function createTextLogger(transports: winston.transport[]): winston.Logger {
  const textLogger = winston.createLogger({
    format: winston.format.combine(
      winston.format.timestamp(),
      applicationFormat(),
      textformat,
    ),
    transports,
  });

  return textLogger;
}

const transport = new winston.transports.Console({ level: env.logLevel });
const logger = env.textLogger ? createTextLogger([transport]) : createJsonLogger([transport]);

/**
 * Configures logs so that they are written to the file with the given name, also suppressing
 * logging to stdout if the suppressStdOut option is set to true
 * @param filename - The name of the file to write logs to
 * @param suppressStdOut - true if logs should not be written to stdout
 */
export function configureLogToFile(filename: string, suppressStdOut = false): void {
  const fileTransport = new winston.transports.File({ filename, level: env.logLevel });
  while (suppressStdOut && logger.transports.length > 0) {
    logger.remove(logger.transports[0]);
  }
  logger.add(fileTransport);
}

export default logger;
