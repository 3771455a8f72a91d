import { logger } from '../utils/logger';
import { NotOrderOwnerError, OrderNotFoundError } from '../utils/errors';
import { sanitizeString, validateRequired } from '../utils/validators';
import { notifyListeners, type OrderLifecycleListener } from './lifecycle-listeners';
import type { Order, OrderStore, PaymentEvidenceKind, PaymentEvidenceUpdate } from '../types';

export const UNKNOWN_PAYMENT_METHOD = 'UNKNOWN';
export const PHOTO_PROOF_REFERENCE = 'PHOTO_PROOF';

/**
 * Payment Ledger
 * Records customer claims of payment. Never changes order status:
 * an operator confirms payment through the state machine.
 */
export class PaymentLedger {
  constructor(
    private readonly orders: OrderStore,
    private readonly listeners: readonly OrderLifecycleListener[] = []
  ) {}

  /**
   * Overwrite method and reference; proof is left as it is
   */
  async submitPayment(orderId: number, requesterId: number, method: string, reference: string): Promise<Order> {
    const evidence = {
      paymentMethod: sanitizeString(method),
      paymentReference: sanitizeString(reference),
    };
    validateRequired(evidence, ['paymentMethod', 'paymentReference']);

    return this.record('REFERENCE', orderId, requesterId, evidence);
  }

  /**
   * Attach proof; method/reference get placeholders only where unset
   */
  async submitProof(orderId: number, requesterId: number, proofReference: string): Promise<Order> {
    const evidence = {
      paymentProofReference: sanitizeString(proofReference),
      fallbackPaymentMethod: UNKNOWN_PAYMENT_METHOD,
      fallbackPaymentReference: PHOTO_PROOF_REFERENCE,
    };
    validateRequired(evidence, ['paymentProofReference']);

    return this.record('PROOF', orderId, requesterId, evidence);
  }

  private async record(
    kind: PaymentEvidenceKind,
    orderId: number,
    requesterId: number,
    evidence: PaymentEvidenceUpdate
  ): Promise<Order> {
    await this.assertOwner(orderId, requesterId);

    // Ownership is re-checked by the write itself
    const updated = await this.orders.recordPaymentEvidence(orderId, requesterId, evidence);
    if (!updated) {
      await this.assertOwner(orderId, requesterId);
      throw new OrderNotFoundError(orderId);
    }

    logger.info('Payment evidence recorded', {
      orderId,
      userId: requesterId,
      kind,
      paymentMethod: updated.paymentMethod,
    });

    const submission = { kind, order: updated, submittedBy: requesterId, submittedAt: updated.updatedAt };
    await notifyListeners(this.listeners, 'paymentEvidence', orderId, (listener) =>
      listener.onPaymentEvidence?.(submission)
    );

    return updated;
  }

  private async assertOwner(orderId: number, requesterId: number): Promise<Order> {
    const order = await this.orders.getById(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    if (order.userId !== requesterId) {
      logger.warn('Rejected payment evidence from non-owner', { orderId, requesterId });
      throw new NotOrderOwnerError(orderId, requesterId);
    }
    return order;
  }
}
