import { registerAs } from '@nestjs/config';
import { envNumber } from './env';

export default registerAs('app', () => ({
  port: envNumber(process.env.PORT, 4000),
}));
