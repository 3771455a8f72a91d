import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { logger } from '../utils/logger';
import type { OrderLifecycleListener } from './lifecycle-listeners';
import type { Order, OrderStatusChange, PaymentEvidenceSubmission } from '../types';

/**
 * Event Publisher Service
 * Publishes order lifecycle events to EventBridge for downstream consumers
 */

export const ORDER_EVENT_SOURCE = 'storefront.orders';
export const PAYMENT_EVENT_SOURCE = 'storefront.payments';

type EventDetail = Record<string, unknown>;

interface PublishEventParams {
  source: string;
  detailType: string;
  detail: EventDetail;
}

export interface EventPublisherOptions {
  eventBusName: string;
  region?: string;
  client?: EventBridgeClient;
}

export class EventPublisher implements OrderLifecycleListener {
  readonly name = 'event-publisher';
  private client: EventBridgeClient;
  private eventBusName: string;

  constructor(options: EventPublisherOptions) {
    this.client =
      options.client ??
      new EventBridgeClient({
        region: options.region || process.env.AWS_REGION || 'us-east-2',
      });
    this.eventBusName = options.eventBusName;
  }

  /**
   * Publish a single event; a rejected entry is an error
   */
  async publish(params: PublishEventParams): Promise<void> {
    const command = new PutEventsCommand({
      Entries: [
        {
          Source: params.source,
          DetailType: params.detailType,
          Detail: JSON.stringify(params.detail),
          EventBusName: this.eventBusName,
        },
      ],
    });

    const response = await this.client.send(command);

    if (response.FailedEntryCount && response.FailedEntryCount > 0) {
      logger.error('Failed to publish event', undefined, {
        failedEntries: response.Entries,
        detailType: params.detailType,
      });
      throw new Error(`Failed to publish event: ${params.detailType}`);
    }

    logger.debug('Event published', {
      source: params.source,
      detailType: params.detailType,
      eventBusName: this.eventBusName,
    });
  }

  async onOrderPlaced(order: Order): Promise<void> {
    await this.publish({
      source: ORDER_EVENT_SOURCE,
      detailType: 'OrderPlaced',
      detail: {
        orderId: order.orderId,
        userId: order.userId,
        items: order.items,
        totalAmount: order.totalAmount,
        status: order.status,
        createdAt: order.createdAt,
      },
    });
  }

  async onPaymentEvidence(submission: PaymentEvidenceSubmission): Promise<void> {
    const { order } = submission;
    await this.publish({
      source: PAYMENT_EVENT_SOURCE,
      detailType: 'PaymentEvidenceSubmitted',
      detail: {
        orderId: order.orderId,
        userId: order.userId,
        kind: submission.kind,
        paymentMethod: order.paymentMethod ?? null,
        paymentReference: order.paymentReference ?? null,
        hasProof: Boolean(order.paymentProofReference),
        submittedAt: submission.submittedAt,
      },
    });
  }

  async onStatusChanged(change: OrderStatusChange): Promise<void> {
    await this.publish({
      source: ORDER_EVENT_SOURCE,
      detailType: 'OrderStatusChanged',
      detail: { ...change },
    });
  }
}
