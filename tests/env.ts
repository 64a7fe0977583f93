// Loaded before any module under test reads its configuration
process.env.NODE_ENV = 'test';
process.env.SERVICE_JWT_SECRET = 'test-secret';
process.env.PAYMENT_WEBHOOK_SECRET = 'test-webhook-secret';
process.env.BOT_NOTIFY_SECRET = 'test-notify-secret';
process.env.BOT_NOTIFY_URL = 'http://bot.test/notify';
process.env.LOG_LEVEL = 'silent';
