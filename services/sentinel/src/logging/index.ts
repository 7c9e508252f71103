import pino from 'pino';

interface LoggerConfig {
  level: string;
}

const REDACTED_FIELDS = [
  'app_token',
  'session_token',
  'password',
  'challenge',
  '*.app_token',
  '*.session_token',
  '*.password',
  'req.headers["x-fbx-app-auth"]'
];

export const createLogger = ({ level }: LoggerConfig, destination?: pino.DestinationStream) => {
  return pino({ level, redact: REDACTED_FIELDS }, destination);
};
