import { createHmac, randomBytes } from 'crypto';
import { AuditEvent, AuditEventType } from '../models/AuditEvent';

const SENSITIVE_KEYS = ['apikey', 'api_key', 'secret', 'password', 'credential', 'token'];

/**
 * Append-only journal of ledger and bot events.
 * Each entry is signed with HMAC-SHA256 so a persisted journal can be checked for tampering.
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;

  constructor(signingKey?: Buffer) {
    this.signingKey = signingKey || randomBytes(32);
  }

  logEvent(
    eventType: AuditEventType,
    details: Record<string, unknown>,
    botId?: string,
    exchange?: string
  ): string {
    const eventId = randomBytes(16).toString('hex');
    const timestamp = new Date();
    const redactedDetails = this.redactSensitiveData(details);

    const signature = this.generateSignature({
      eventId,
      timestamp,
      eventType,
      botId,
      exchange,
      details: redactedDetails
    });

    this.auditLog.push({
      eventId,
      timestamp,
      eventType,
      botId,
      exchange,
      details: redactedDetails,
      signature
    });

    return eventId;
  }

  /**
   * Exports events, optionally restricted to a date range and an event type
   */
  exportAuditLog(startDate?: Date, endDate?: Date, eventType?: AuditEventType): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (startDate && event.timestamp < startDate) return false;
        if (endDate && event.timestamp > endDate) return false;
        if (eventType && event.eventType !== eventType) return false;
        return true;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  verifyLogIntegrity(): boolean {
    return this.auditLog.every(event => {
      const { signature, ...unsigned } = event;
      return signature === this.generateSignature(unsigned);
    });
  }

  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  /**
   * Test helper
   */
  clearLog(): void {
    this.auditLog = [];
  }

  private generateSignature(eventData: Omit<AuditEvent, 'signature'>): string {
    const signingData = {
      eventId: eventData.eventId,
      timestamp: eventData.timestamp.toISOString(),
      eventType: eventData.eventType,
      botId: eventData.botId || null,
      exchange: eventData.exchange || null,
      details: JSON.stringify(canonicalize(eventData.details))
    };

    const dataString = JSON.stringify(signingData, Object.keys(signingData).sort());
    return createHmac('sha256', this.signingKey)
      .update(dataString)
      .digest('hex');
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else if (Array.isArray(value)) {
        redacted[key] = value.map(item => (isPlainRecord(item) ? this.redactSensitiveData(item) : item));
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// Sorted keys at every depth so the signature does not depend on insertion order
function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (isPlainRecord(value)) {
    return Object.fromEntries(
      Object.keys(value).sort().map(key => [key, canonicalize(value[key])])
    );
  }
  return value;
}
