import { registerAs } from '@nestjs/config';
import { envNumber, envString } from './env';

export default registerAs('database', () => ({
  host: envString(process.env.DB_HOST, 'localhost'),
  port: envNumber(process.env.DB_PORT, 5432),
  username: envString(process.env.DB_USERNAME, 'postgres'),
  password: process.env.DB_PASSWORD ?? '',
  name: envString(process.env.DB_NAME, 'films'),
}));
