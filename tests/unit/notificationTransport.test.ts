import { describe, it, expect } from 'vitest';
import { LoggingNotificationTransport, channelsFor } from '../../src/services/notificationTransport.js';
import { __enableTestLogCollector, __resetLoggerForTests } from '../../src/utils/logging.js';
import { isNotificationId } from '../../src/utils/notificationId.js';

describe('channelsFor', () => {
  it('derives channels from the supplied contacts', () => {
    expect(channelsFor({})).toEqual([]);
    expect(channelsFor({ email: 'ops@example.com' })).toEqual(['email']);
    expect(channelsFor({ email: 'ops@example.com', phone: '+15550100' })).toEqual(['email', 'sms']);
  });
});

describe('LoggingNotificationTransport', () => {
  it('logs a rendered preview per channel', async () => {
    const logs = __enableTestLogCollector();
    try {
      const result = await new LoggingNotificationTransport().send({
        channels: ['email', 'sms'],
        recipient: { email: 'ops@example.com', phone: '+15550100' },
        language: 'en',
        templateKey: 'delayed',
        context: { shipment_id: 'S1', ml_confidence: '80.0%', tracking_url: 'https://t.example/S1' },
      });
      expect(result.sent).toBe(true);
      expect(isNotificationId(result.notificationId)).toBe(true);
      const lines = logs.map((l) => JSON.parse(l));
      expect(lines.find((l) => l.msg === 'email-preview')).toMatchObject({
        to: 'ops@example.com',
        subject: 'Important: Shipment S1 may be delayed',
        notificationId: result.notificationId,
      });
      expect(lines.find((l) => l.msg === 'sms-preview')).toMatchObject({
        to: '+15550100',
        text: 'Shipment S1 may be delayed (80.0%). Track: https://t.example/S1',
      });
    } finally {
      __resetLoggerForTests();
    }
  });

  it('reports nothing sent without channels', async () => {
    const result = await new LoggingNotificationTransport().send({
      channels: [],
      recipient: {},
      language: 'en',
      templateKey: 'delayed',
      context: { shipment_id: 'S1' },
    });
    expect(result.sent).toBe(false);
  });
});
