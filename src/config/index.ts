import { LogLevel, parseLogLevel } from '../utils/logger';
import { validateEnvironment } from '../utils/dynamodb-client';
import { ValidationError } from '../utils/validators';
import { parseOperatorIds } from '../services/operator-identity';
import { TransitionMode } from '../types';

/**
 * Storefront Configuration
 * Everything comes from environment variables, read once at start-up
 */

export const TABLE_ENV_VARS = {
  products: 'PRODUCTS_TABLE_NAME',
  carts: 'CARTS_TABLE_NAME',
  orders: 'ORDERS_TABLE_NAME',
  orderEvents: 'ORDER_EVENTS_TABLE_NAME',
  settings: 'SETTINGS_TABLE_NAME',
  sequences: 'SEQUENCES_TABLE_NAME',
} as const;

export type TableKey = keyof typeof TABLE_ENV_VARS;

export interface StorefrontConfig {
  region: string;
  tables: Record<TableKey, string>;
  eventBusName?: string;              // No EventBridge publishing when unset
  operatorIds: number[];
  transitionMode: TransitionMode;
  logLevel: LogLevel;
}

function parseTransitionMode(raw: string | undefined): TransitionMode {
  const value = raw?.trim().toUpperCase();
  if (!value) {
    return TransitionMode.PERMISSIVE;
  }

  const mode = Object.values(TransitionMode).find((candidate) => candidate === value);
  if (!mode) {
    throw new ValidationError(
      `ORDER_TRANSITION_MODE must be one of: ${Object.values(TransitionMode).join(', ')}`,
      'ORDER_TRANSITION_MODE',
      raw
    );
  }
  return mode;
}

function readTable(env: NodeJS.ProcessEnv, key: TableKey): string {
  return env[TABLE_ENV_VARS[key]] ?? '';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StorefrontConfig {
  validateEnvironment(Object.values(TABLE_ENV_VARS), env);

  const eventBusName = env.EVENT_BUS_NAME?.trim();

  return {
    region: env.AWS_REGION || 'us-east-2',
    tables: {
      products: readTable(env, 'products'),
      carts: readTable(env, 'carts'),
      orders: readTable(env, 'orders'),
      orderEvents: readTable(env, 'orderEvents'),
      settings: readTable(env, 'settings'),
      sequences: readTable(env, 'sequences'),
    },
    ...(eventBusName ? { eventBusName } : {}),
    operatorIds: parseOperatorIds(env.OPERATOR_IDS),
    transitionMode: parseTransitionMode(env.ORDER_TRANSITION_MODE),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
