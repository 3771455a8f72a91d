import { logger } from '../utils/logger';
import type { OperatorIdentity } from './operator-identity';
import type { OrderLifecycleListener } from './lifecycle-listeners';
import type { Order, OrderStatusChange, PaymentEvidenceSubmission } from '../types';

/**
 * Delivers a short text to a chat user. Provided by the transport.
 */
export interface Notifier {
  notify(userId: number, text: string): Promise<void>;
}

export function formatOrderPlaced(order: Order): string {
  const lines = order.items.map((item) => `- ${item.productName} x${item.quantity} = ${item.totalPrice}`);
  return [
    `New order #${order.orderId}`,
    `User: ${order.userId}`,
    `Customer: ${order.customerName} (${order.phone})`,
    ...lines,
    `Total: ${order.totalAmount}`,
  ].join('\n');
}

export function formatPaymentEvidence(submission: PaymentEvidenceSubmission): string {
  const { order } = submission;
  if (submission.kind === 'PROOF') {
    return `Payment proof for order #${order.orderId}\nUser: ${submission.submittedBy}`;
  }
  return [
    `Payment submitted for order #${order.orderId}`,
    `User: ${submission.submittedBy}`,
    `Method: ${order.paymentMethod ?? ''}`,
    `Ref: ${order.paymentReference ?? ''}`,
  ].join('\n');
}

export function formatStatusChange(change: OrderStatusChange): string {
  return `Order #${change.orderId} status: ${change.oldStatus} -> ${change.newStatus}`;
}

/**
 * Turns lifecycle callbacks into chat messages: customers hear about their
 * order's status, operators about new orders and payment evidence.
 */
export class NotificationService implements OrderLifecycleListener {
  readonly name = 'notification-service';

  constructor(
    private readonly notifier: Notifier,
    private readonly operators: OperatorIdentity
  ) {}

  async onOrderPlaced(order: Order): Promise<void> {
    await this.broadcast(this.operators.listOperators(), formatOrderPlaced(order), order.orderId);
  }

  async onPaymentEvidence(submission: PaymentEvidenceSubmission): Promise<void> {
    await this.broadcast(
      this.operators.listOperators(),
      formatPaymentEvidence(submission),
      submission.order.orderId
    );
  }

  async onStatusChanged(change: OrderStatusChange): Promise<void> {
    await this.broadcast([change.userId], formatStatusChange(change), change.orderId);
  }

  /**
   * Each recipient is attempted; returns how many deliveries succeeded
   */
  private async broadcast(recipients: number[], text: string, orderId: number): Promise<number> {
    let delivered = 0;
    for (const userId of recipients) {
      try {
        await this.notifier.notify(userId, text);
        delivered++;
      } catch (error) {
        logger.warn('Notification delivery failed', {
          orderId,
          recipient: userId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return delivered;
  }
}
