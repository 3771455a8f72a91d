import { logger } from '../utils/logger';
import type { Order, OrderStatusChange, PaymentEvidenceSubmission } from '../types';

/**
 * Receives order lifecycle callbacks after the change is committed.
 * Implementations may fail; callers never let that affect core state.
 */
export interface OrderLifecycleListener {
  readonly name: string;
  onOrderPlaced?(order: Order): Promise<void>;
  onPaymentEvidence?(submission: PaymentEvidenceSubmission): Promise<void>;
  onStatusChanged?(change: OrderStatusChange): Promise<void>;
}

/**
 * Run one callback on every listener. Failures are logged and swallowed;
 * one listener failing does not skip the others.
 */
export async function notifyListeners(
  listeners: readonly OrderLifecycleListener[],
  event: string,
  orderId: number,
  deliver: (listener: OrderLifecycleListener) => Promise<void> | undefined
): Promise<void> {
  for (const listener of listeners) {
    try {
      await deliver(listener);
    } catch (error) {
      logger.warn('Order listener failed', {
        listener: listener.name,
        event,
        orderId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
