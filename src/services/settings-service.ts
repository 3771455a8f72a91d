import { logger } from '../utils/logger';
import { UnauthorizedError } from '../utils/errors';
import { ValidationError, sanitizeString } from '../utils/validators';
import type { OperatorIdentity } from './operator-identity';
import type { PaymentInstructions, SettingsStore } from '../types';

export const PAYMENT_METHODS_KEY = 'payment_methods';
export const PAYMENT_TEXT_KEY = 'payment_text';
export const DEFAULT_PAYMENT_METHODS = 'KBZPay,WavePay,COD';
export const DEFAULT_PAYMENT_TEXT = 'Payment details have not been set up yet. Please contact the shop.';

export function splitPaymentMethods(raw: string): string[] {
  return raw
    .split(',')
    .map((method) => method.trim())
    .filter((method) => method !== '');
}

export class SettingsService {
  constructor(
    private readonly settings: SettingsStore,
    private readonly operators: OperatorIdentity
  ) {}

  async get(key: string, defaultValue: string = ''): Promise<string> {
    return (await this.settings.get(key)) ?? defaultValue;
  }

  async set(key: string, value: string): Promise<void> {
    await this.settings.set(key, value);
  }

  async getPaymentInstructions(): Promise<PaymentInstructions> {
    const [methods, text] = await Promise.all([
      this.get(PAYMENT_METHODS_KEY, DEFAULT_PAYMENT_METHODS),
      this.get(PAYMENT_TEXT_KEY, DEFAULT_PAYMENT_TEXT),
    ]);
    return { methods: splitPaymentMethods(methods), text };
  }

  async updatePaymentMethods(actorId: number, methods: string[]): Promise<void> {
    this.requireOperator(actorId);
    const value = methods.map((method) => sanitizeString(method)).filter((method) => method !== '');
    if (value.length === 0) {
      throw new ValidationError('At least one payment method is required', 'methods', methods);
    }

    await this.settings.set(PAYMENT_METHODS_KEY, value.join(','));
    logger.info('Payment methods updated', { actorId, methods: value });
  }

  async updatePaymentText(actorId: number, text: string): Promise<void> {
    this.requireOperator(actorId);
    const value = sanitizeString(text);
    if (value === '') {
      throw new ValidationError('Payment text is required', 'text', text);
    }

    await this.settings.set(PAYMENT_TEXT_KEY, value);
    logger.info('Payment text updated', { actorId });
  }

  private requireOperator(actorId: number): void {
    if (!this.operators.isOperator(actorId)) {
      throw new UnauthorizedError(actorId, 'change payment settings');
    }
  }
}
