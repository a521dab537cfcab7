import { registerAs } from '@nestjs/config';

export default registerAs('app', () => ({
	port: parseInt(process.env.PORT_API || process.env.PORT || '3000', 10),
	// Shared access token; login is refused while it is unset
	accessToken: process.env.APP_PASSWORD || null,
	nodeEnv: process.env.NODE_ENV || 'development',
}));
