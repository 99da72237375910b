import 'reflect-metadata';
import _ from 'lodash';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import { IsBoolean, IsIn, IsNotEmpty, ValidationError, validateSync } from 'class-validator';
import { isBoolean, isFloat, isInteger, parseBoolean } from './string';

// The application logger is configured from this module, so it cannot be used here
const logger = winston.createLogger({
  transports: [
    new winston.transports.Console(),
  ],
});

//
// env module
// Loads the configuration of the library from the env-defaults file next to this module,
// an optional .env file and process.env, in increasing order of precedence. Only variables
// named in env-defaults are picked up.
//

export const logLevels = Object.keys(winston.config.npm.levels);

/**
 * Parse a string env variable to a boolean or number if necessary.
 *
 * @param stringValue - The environment variable value as a string
 * @returns the parsed value
 */
function makeConfigVar(stringValue: string): number | string | boolean {
  if (isInteger(stringValue)) {
    return parseInt(stringValue, 10);
  } else if (isFloat(stringValue)) {
    return parseFloat(stringValue);
  } else if (isBoolean(stringValue)) {
    return parseBoolean(stringValue);
  } else {
    return stringValue;
  }
}

/**
  Get any errors from validating the environment - leave out the env object itself
  from the output.
  @param env - the CollectionEnv instance, including constraints
  @returns An array of `ValidationError`s
*/
export function getValidationErrors(env: CollectionEnv): ValidationError[] {
  return validateSync(env, { validationError: { target: false } });
}

/**
 * Returns the environment config properties with snake-cased keys. Values come from
 * process.env, then the .env file, then the env-defaults file.
 * @param dotEnvPath - path to the .env file, skipped if it does not exist
 * @returns the environment variables named in env-defaults
 */
function loadEnvFromFiles(dotEnvPath?: string): Record<string, string> {
  const envDefaults = dotenv.parse(fs.readFileSync(path.resolve(__dirname, 'env-defaults')));
  let envOverrides: Record<string, string> = {};
  if (dotEnvPath && fs.existsSync(dotEnvPath)) {
    envOverrides = dotenv.parse(fs.readFileSync(dotEnvPath));
  }
  const env: Record<string, string> = {};
  for (const k of Object.keys(envDefaults)) {
    env[k] = process.env[k] ?? envOverrides[k] ?? envDefaults[k];
  }
  return env;
}

export class CollectionEnv {
  @IsNotEmpty()
  applicationName!: string;

  @IsIn(logLevels)
  logLevel!: string;

  @IsBoolean()
  textLogger!: boolean;

  @IsBoolean()
  requireEoBands!: boolean;

  @IsBoolean()
  allowAntimeridianBbox!: boolean;

  /**
   * Validate the loaded env vars.
   * @throws Error on constraint violation
   */
  validate(): void {
    const errors = getValidationErrors(this);
    if (errors.length > 0) {
      for (const err of errors) {
        logger.error(err.toString());
      }
      throw new Error('BAD ENVIRONMENT');
    }
  }

  /**
   * Constructs the CollectionEnv instance.
   * @param dotEnvPath - path to the .env file
   */
  constructor(dotEnvPath = '.env') {
    const env = loadEnvFromFiles(dotEnvPath); // { LOG_LEVEL: 'info', ... }
    const config = _.mapValues(_.mapKeys(env, (_value, k) => _.camelCase(k)), makeConfigVar);
    Object.assign(this, config); // { logLevel: 'info', ... }
  }
}

const env = new CollectionEnv();
env.validate();

export default env;
