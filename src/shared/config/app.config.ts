import { plainToInstance } from 'class-transformer';
import { IsIn, IsNotEmpty, IsString, validateSync } from 'class-validator';

export const NODE_ENVS = ['development', 'production', 'test'] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export class AppConfig {
  @IsIn(NODE_ENVS)
  nodeEnv!: NodeEnv;

  // Defaults to warn so log lines stay out of the interactive session
  @IsIn(LOG_LEVELS)
  logLevel!: LogLevel;

  @IsString()
  @IsNotEmpty()
  prompt!: string;
}

export function loadAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const config = plainToInstance(AppConfig, {
    nodeEnv: env.NODE_ENV ?? 'development',
    logLevel: env.LOG_LEVEL ?? 'warn',
    prompt: env.CONTACT_BOOK_PROMPT ?? '>>> ',
  });

  const errors = validateSync(config);
  if (errors.length > 0) {
    const details = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid configuration: ${details.join('; ')}`);
  }

  return config;
}
