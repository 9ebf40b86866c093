import { IWhatsAppSender, WhatsAppTarget } from '../types';
import logger from '../../../utils/logger';

const GATEWAY_TIMEOUT_MS = 15_000;

export interface WhatsAppGatewayConfig {
  url: string | null;
  token: string | null;
}

interface GatewayPayload {
  to: string;
  type: WhatsAppTarget['kind'];
  message: string;
}

/**
 * Delivers WhatsApp messages through an HTTP messaging gateway that owns the
 * WhatsApp session. The gateway receives `{ to, type, message }` and answers
 * 2xx once the message is queued.
 */
export class WhatsAppSender implements IWhatsAppSender {
  private readonly url: string | null;
  private readonly token: string | null;

  constructor(config: WhatsAppGatewayConfig) {
    this.url = config.url ? config.url.replace(/\/+$/, '') : null;
    this.token = config.token;
  }

  async sendWhatsApp(target: WhatsAppTarget, message: string): Promise<boolean> {
    if (!this.url) {
      logger.warn('whatsapp gateway url not configured');
      return false;
    }

    const address = target.address.trim();
    if (!address) {
      return false;
    }

    const payload: GatewayPayload = { to: address, type: target.kind, message };
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), GATEWAY_TIMEOUT_MS);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (response.ok) {
        logger.info({ to: address, type: target.kind }, 'whatsapp alert sent');
        return true;
      }

      const body = await response.text().catch(() => '');
      logger.warn({ to: address, status: response.status, body: body.slice(0, 200) }, 'whatsapp gateway rejected message');
      return false;
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') {
        logger.warn({ to: address }, 'whatsapp gateway request timed out');
        return false;
      }
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn({ to: address, reason }, 'whatsapp gateway request failed');
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
