import { DispatchTransportError } from '../core/errors.js';
import type { ExceptionFinding, Language } from '../core/types.js';
import {
  dispatchRetriesTotal,
  notificationFailuresTotal,
  notificationsSentTotal,
} from '../metrics/index.js';
import { getComponentLogger } from '../utils/logging.js';
import { generateNotificationId } from '../utils/notificationId.js';
import { buildCanonicalPayload, hmacSign, SIGNATURE_HEADER } from '../utils/signing.js';
import {
  findingTemplateContext,
  renderTemplate,
  resolveLanguage,
  type RenderedMessage,
} from './templates.js';

export interface DispatcherOptions {
  baseUrl: string;
  skill: string;
  timeoutMs: number;
  retryDelayMs: number;
  signingSecret?: string;
  defaultLanguage: string;
  trackingBaseUrl: string;
}

export interface DispatchSignals {
  /** Soft cycle deadline: aborts the in-flight call and stops further dispatch. */
  deadline?: AbortSignal;
  /** Scheduler stop: lets the in-flight call finish, starts nothing new. */
  cancel?: AbortSignal;
}

export type DispatchStatus = 'sent' | 'failed' | 'abandoned';

export interface DispatchOutcome {
  notificationId: string;
  shipmentId: string;
  type: ExceptionFinding['type'];
  status: DispatchStatus;
  attempts: number;
  language: Language;
  error?: string;
}

export interface DispatchSummary {
  sent: number;
  failed: number;
  outcomes: DispatchOutcome[];
}

export interface HandlerMessage {
  skill: string;
  type: ExceptionFinding['type'];
  severity: ExceptionFinding['severity'];
  shipment_id: string;
  details: ExceptionFinding['details'];
  notification_id: string;
  message: Pick<RenderedMessage, 'language' | 'subject' | 'body'>;
}

const MAX_ATTEMPTS = 2; // one retry on transient failure

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Resolves after `ms`, or as soon as any of the signals aborts. */
function sleep(ms: number, signals: ReadonlyArray<AbortSignal | undefined> = []): Promise<void> {
  const active = signals.filter((s): s is AbortSignal => s !== undefined);
  if (active.some((s) => s.aborted)) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      for (const s of active) s.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    for (const s of active) s.addEventListener('abort', done, { once: true });
  });
}

/**
 * Sends each finding to the exception-handling agent (`<baseUrl>/message:send`).
 * Findings go out one at a time in the order given, so a deadline cuts the
 * least severe ones.
 */
export class NotificationDispatcher {
  constructor(private readonly opts: DispatcherOptions) {}

  get endpoint(): string {
    return `${this.opts.baseUrl.replace(/\/+$/, '')}/message:send`;
  }

  async dispatchAll(
    findings: readonly ExceptionFinding[],
    signals: DispatchSignals = {},
    languageFor: (shipmentId: string) => string | undefined = () => undefined,
  ): Promise<DispatchSummary> {
    const outcomes: DispatchOutcome[] = [];
    for (const finding of findings) {
      outcomes.push(await this.dispatch(finding, signals, languageFor(finding.shipmentId)));
    }
    const sent = outcomes.filter((o) => o.status === 'sent').length;
    return { sent, failed: outcomes.length - sent, outcomes };
  }

  buildMessage(finding: ExceptionFinding, notificationId: string, language: Language): HandlerMessage {
    const rendered = renderTemplate(
      finding.type,
      language,
      findingTemplateContext(finding, this.opts.trackingBaseUrl),
    );
    return {
      skill: this.opts.skill,
      type: finding.type,
      severity: finding.severity,
      shipment_id: finding.shipmentId,
      details: finding.details,
      notification_id: notificationId,
      message: { language: rendered.language, subject: rendered.subject, body: rendered.body },
    };
  }

  async dispatch(
    finding: ExceptionFinding,
    signals: DispatchSignals = {},
    preferredLanguage?: string,
  ): Promise<DispatchOutcome> {
    const log = getComponentLogger('dispatcher');
    // Generated before any attempt so a failed call can still be correlated
    const notificationId = generateNotificationId();
    const resolved = resolveLanguage(preferredLanguage ?? this.opts.defaultLanguage);
    if (resolved.fellBack) {
      log.warn(
        { notificationId, shipmentId: finding.shipmentId, requested: preferredLanguage },
        'unsupported-language-fallback',
      );
    }
    const base = {
      notificationId,
      shipmentId: finding.shipmentId,
      type: finding.type,
      language: resolved.language,
    };

    if (signals.deadline?.aborted || signals.cancel?.aborted) {
      const reason = signals.deadline?.aborted ? 'deadline' : 'cancelled';
      notificationFailuresTotal.inc({ reason });
      log.warn({ ...base, reason }, 'dispatch-abandoned');
      return { ...base, status: 'abandoned', attempts: 0, error: reason };
    }

    const message = this.buildMessage(finding, notificationId, resolved.language);
    for (let attempt = 1; ; attempt++) {
      try {
        await this.post(message, signals.deadline);
        notificationsSentTotal.inc({ type: finding.type });
        log.info({ ...base, severity: finding.severity, attempts: attempt }, 'dispatch-sent');
        return { ...base, status: 'sent', attempts: attempt };
      } catch (err) {
        const e =
          err instanceof DispatchTransportError
            ? err
            : new DispatchTransportError(errorMessage(err), false, undefined, err);
        log.warn(
          { ...base, attempt, status: e.status, transient: e.transient, err: e },
          'dispatch-attempt-failed',
        );
        const stopped = signals.deadline?.aborted || signals.cancel?.aborted;
        if (!e.transient || attempt >= MAX_ATTEMPTS || stopped) {
          const reason = signals.deadline?.aborted
            ? 'deadline'
            : e.status !== undefined && !e.transient
              ? 'rejected'
              : 'transport';
          notificationFailuresTotal.inc({ reason });
          log.error({ ...base, attempts: attempt, reason }, 'dispatch-failed');
          return { ...base, status: 'failed', attempts: attempt, error: e.message };
        }
        dispatchRetriesTotal.inc();
        await sleep(this.opts.retryDelayMs, [signals.deadline, signals.cancel]);
        if (signals.deadline?.aborted || signals.cancel?.aborted) {
          const reason = signals.deadline?.aborted ? 'deadline' : 'cancelled';
          notificationFailuresTotal.inc({ reason });
          log.warn({ ...base, attempts: attempt, reason }, 'dispatch-retry-skipped');
          return { ...base, status: 'failed', attempts: attempt, error: e.message };
        }
      }
    }
  }

  private async post(message: HandlerMessage, deadline?: AbortSignal): Promise<void> {
    const body = buildCanonicalPayload(message);
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.signingSecret) {
      headers[SIGNATURE_HEADER] = hmacSign(body, this.opts.signingSecret);
    }
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    const onDeadline = () => controller.abort();
    deadline?.addEventListener('abort', onDeadline, { once: true });
    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
    } catch (err) {
      if (deadline?.aborted) {
        throw new DispatchTransportError('cycle deadline exceeded', false, undefined, err);
      }
      const timedOut = controller.signal.aborted;
      throw new DispatchTransportError(
        timedOut ? `handler timed out after ${this.opts.timeoutMs}ms` : errorMessage(err),
        true,
        undefined,
        err,
      );
    } finally {
      clearTimeout(timer);
      deadline?.removeEventListener('abort', onDeadline);
    }
    if (!res.ok) {
      throw new DispatchTransportError(`handler responded ${res.status}`, res.status >= 500, res.status);
    }
  }
}
