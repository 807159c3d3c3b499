import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration parsed and validated at startup
 */
export interface Config {
  // Server
  port: number;
  nodeEnv: 'development' | 'production' | 'test';

  // Database
  databaseUrl: string;

  // API Configuration
  corsOrigin: string;
  uploadMaxSize: number; // in bytes

  // Logging
  logLevel: string;
  serviceName: string;

  // MinIO Storage
  minioEndpoint: string;
  minioAccessKey: string;
  minioSecretKey: string;
  minioBucket: string;

  // Built-in accounts
  adminPassword: string;
  scoringPassword: string;

  // Event rulebook (JSON file)
  eventConfigPath: string;

  // Notification queue
  notificationsEnabled: boolean;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;

function isNodeEnv(value: string): value is Config['nodeEnv'] {
  return NODE_ENVS.some((env) => env === value);
}

/**
 * Parse and validate environment variables
 * Throws an error if required variables are missing or invalid
 */
function parseConfig(): Config {
  const errors: string[] = [];

  // Helper to get required env var
  const getRequired = (key: string): string => {
    const value = process.env[key];
    if (!value || value.trim() === '') {
      errors.push(`Missing required environment variable: ${key}`);
      return '';
    }
    return value;
  };

  // Helper to parse required number
  const getRequiredNumber = (key: string): number => {
    const value = process.env[key];
    if (!value || value.trim() === '') {
      errors.push(`Missing required environment variable: ${key}`);
      return 0;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      errors.push(`Invalid number for ${key}: ${value}`);
      return 0;
    }
    return parsed;
  };

  const rawNodeEnv = getRequired('NODE_ENV');
  let nodeEnv: Config['nodeEnv'] = 'development';
  if (isNodeEnv(rawNodeEnv)) {
    nodeEnv = rawNodeEnv;
  } else if (rawNodeEnv !== '') {
    errors.push(`Invalid NODE_ENV: ${rawNodeEnv}. Must be development, production, or test`);
  }

  const config: Config = {
    port: getRequiredNumber('PORT'),
    nodeEnv,
    databaseUrl: getRequired('DATABASE_URL'),
    corsOrigin: getRequired('CORS_ORIGIN'),
    uploadMaxSize: getRequiredNumber('UPLOAD_MAX_SIZE'),
    logLevel: process.env.LOG_LEVEL || 'debug',
    serviceName: process.env.SERVICE_NAME || 'registration',
    minioEndpoint: getRequired('MINIO_ENDPOINT'),
    minioAccessKey: getRequired('MINIO_ROOT_USER'),
    minioSecretKey: getRequired('MINIO_ROOT_PASSWORD'),
    minioBucket: getRequired('MINIO_BUCKET'),
    adminPassword: getRequired('ADMIN_PASSWORD'),
    scoringPassword: getRequired('SCORING_PASSWORD'),
    eventConfigPath: getRequired('EVENT_CONFIG_PATH'),
    notificationsEnabled: process.env.NOTIFICATIONS_ENABLED !== 'false',
  };

  // Throw if any errors
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return config;
}

/**
 * Singleton config instance
 * Parsed and validated at module load time
 */
export const config: Config = parseConfig();
