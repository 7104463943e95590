import type { Language, NotificationChannel } from '../core/types.js';
import { getComponentLogger } from '../utils/logging.js';
import { generateNotificationId } from '../utils/notificationId.js';
import { renderTemplate, type TemplateContext, type TemplateKey } from './templates.js';

export interface Recipient {
  email?: string;
  phone?: string;
}

export interface SendRequest {
  channels: NotificationChannel[];
  recipient: Recipient;
  language: Language;
  templateKey: TemplateKey;
  context: TemplateContext;
}

export interface SendResult {
  sent: boolean;
  notificationId: string;
}

export interface NotificationTransport {
  send(request: SendRequest): Promise<SendResult>;
}

export function channelsFor(recipient: Recipient): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  if (recipient.email) channels.push('email');
  if (recipient.phone) channels.push('sms');
  return channels;
}

/** Renders and logs each message instead of delivering it. */
export class LoggingNotificationTransport implements NotificationTransport {
  async send(request: SendRequest): Promise<SendResult> {
    const log = getComponentLogger('notification-transport');
    const notificationId = generateNotificationId();
    const rendered = renderTemplate(request.templateKey, request.language, request.context);
    for (const channel of request.channels) {
      if (channel === 'email') {
        log.info(
          { notificationId, to: request.recipient.email, subject: rendered.subject, body: rendered.body },
          'email-preview',
        );
      } else {
        log.info({ notificationId, to: request.recipient.phone, text: rendered.sms }, 'sms-preview');
      }
    }
    return { sent: request.channels.length > 0, notificationId };
  }
}
