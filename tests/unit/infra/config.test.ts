import { describe, expect, it } from 'vitest';

import { createConfig, parseEnv, parseMentions } from '@/infra/config/env.js';
import { getAllowedOrigins } from '@/infra/plugins/cors.js';

import { makeTestConfig } from '../../fixtures/builders.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      SHEETS_SOURCE: 'api',
      REPORT_TIMEZONE: 'Asia/Manila',
      LOW_SPEND_THRESHOLD_USD: 100,
      NO_CHANGE_ALERT: true,
    });
  });

  it('reads numbers and booleans', () => {
    const env = parseEnv({ PORT: '8080', LOW_SPEND_THRESHOLD_USD: '50', NO_CHANGE_ALERT: 'false' });

    expect(env.PORT).toBe(8080);
    expect(env.LOW_SPEND_THRESHOLD_USD).toBe(50);
    expect(env.NO_CHANGE_ALERT).toBe(false);
  });

  it('rejects invalid values', () => {
    expect(() => parseEnv({ SHEETS_SOURCE: 'ftp' })).toThrow(/^Invalid environment configuration: /);
    expect(() => parseEnv({ LOW_SPEND_THRESHOLD_USD: 'lots' })).toThrow(/LOW_SPEND_THRESHOLD_USD/);
  });
});

describe('parseMentions', () => {
  it('maps upper-cased names to usernames without the @', () => {
    expect(parseMentions('anna:@anna_ads, bruno:bruno_ads,broken')).toEqual({
      ANNA: 'anna_ads',
      BRUNO: 'bruno_ads',
    });
    expect(parseMentions(undefined)).toEqual({});
  });
});

describe('createConfig', () => {
  it('groups settings by concern', () => {
    const config = createConfig(
      parseEnv({ NODE_ENV: 'production', TELEGRAM_CHAT_ID: 'test-chat', TELEGRAM_MENTIONS: 'anna:anna_ads' })
    );

    expect(config.server.isProduction).toBe(true);
    expect(config.logger.pretty).toBe(false);
    expect(config.telegram).toEqual({ botToken: undefined, chatId: 'test-chat', mentions: { ANNA: 'anna_ads' } });
  });
});

describe('getAllowedOrigins', () => {
  it('merges the origin list with the client URL', () => {
    const config = makeTestConfig({
      cors: { allowedOrigins: 'https://a.example, https://b.example,', clientBaseUrl: 'https://app.example' },
    });

    expect([...getAllowedOrigins(config)]).toEqual([
      'https://a.example',
      'https://b.example',
      'https://app.example',
    ]);
  });
});
