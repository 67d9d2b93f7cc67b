import { config } from 'dotenv'

config()

// tests must never reach the real API through a developer's .env
delete process.env.MANGABAKA_API_URL
delete process.env.MANGABAKA_API_KEY
delete process.env.MANGABAKA_TIMEOUT_MS
delete process.env.MANGABAKA_REQUESTS_PER_MINUTE
