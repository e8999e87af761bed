const defaults: Record<string, string> = {
  PORT: '3000',
  LOG_LEVEL: 'silent',
  PUBLIC_BASE_URL: 'https://voice.example.test',
  MEDIA_STREAM_TOKEN: 'test-token',
  TWILIO_ACCOUNT_SID: 'AC-test',
  TWILIO_AUTH_TOKEN: 'test-secret',
  TWILIO_PHONE_NUMBER: '+15550000001',
  TWILIO_API_BASE_URL: 'http://twilio.test/2010-04-01',
  WHISPER_URL: 'http://localhost/whisper',
  TTS_URL: 'http://localhost/tts',
  REDIS_URL: 'redis://localhost:6379',
  GLOBAL_CONCURRENCY_CAP: '30',
  LINE_CONCURRENCY_CAP_DEFAULT: '5',
  LINE_CALLS_PER_MIN_CAP_DEFAULT: '10',
  CAPACITY_TTL_SECONDS: '600',
  CAP_PREFIX: 'cap',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
