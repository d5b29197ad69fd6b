import { registerAs } from '@nestjs/config';
import { envNumber, envString } from './env';

export default registerAs('redis', () => ({
  host: envString(process.env.REDIS_HOST, 'localhost'),
  port: envNumber(process.env.REDIS_PORT, 6379),
}));
