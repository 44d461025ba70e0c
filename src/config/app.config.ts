import { registerAs } from '@nestjs/config';
import { Env, loadEnv } from './env.schema';

export interface AppSettings {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  host: string;
  logLevel: Env['LOG_LEVEL'];
}

export default registerAs('app', (): AppSettings => {
  const env = loadEnv();
  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST_IP,
    logLevel: env.LOG_LEVEL,
  };
});
