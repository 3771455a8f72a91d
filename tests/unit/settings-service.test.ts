import {
  DEFAULT_PAYMENT_TEXT,
  PAYMENT_METHODS_KEY,
  SettingsService,
  splitPaymentMethods,
} from '../../src/services/settings-service';
import { UnauthorizedError } from '../../src/utils/errors';
import { ValidationError } from '../../src/utils/validators';
import { CUSTOMER_ID, OPERATOR_ID, createStores, type TestStores } from '../fixtures/test-data';

describe('SettingsService', () => {
  let stores: TestStores;
  let settings: SettingsService;

  beforeEach(() => {
    stores = createStores();
    settings = new SettingsService(stores.settings, stores.operators);
  });

  it('should fall back to the default for unset keys', async () => {
    expect(await settings.get('missing', 'fallback')).toBe('fallback');
    expect(await settings.get('missing')).toBe('');

    await settings.set('missing', 'present');
    expect(await settings.get('missing', 'fallback')).toBe('present');
  });

  it('should serve default payment instructions', async () => {
    expect(await settings.getPaymentInstructions()).toEqual({
      methods: ['KBZPay', 'WavePay', 'COD'],
      text: DEFAULT_PAYMENT_TEXT,
    });
  });

  it('should store payment methods for operators', async () => {
    await settings.updatePaymentMethods(OPERATOR_ID, [' KBZPay ', '', 'AYA Pay']);

    expect(stores.settings.values.get(PAYMENT_METHODS_KEY)).toBe('KBZPay,AYA Pay');
    expect((await settings.getPaymentInstructions()).methods).toEqual(['KBZPay', 'AYA Pay']);
  });

  it('should store payment text for operators', async () => {
    await settings.updatePaymentText(OPERATOR_ID, 'KBZPay 09-000-0000 (Test Shop)\n');

    expect((await settings.getPaymentInstructions()).text).toBe('KBZPay 09-000-0000 (Test Shop)');
  });

  it('should reject empty updates', async () => {
    await expect(settings.updatePaymentMethods(OPERATOR_ID, [' '])).rejects.toThrow(ValidationError);
    await expect(settings.updatePaymentText(OPERATOR_ID, '')).rejects.toThrow(ValidationError);
  });

  it('should reject customers', async () => {
    await expect(settings.updatePaymentMethods(CUSTOMER_ID, ['COD'])).rejects.toThrow(UnauthorizedError);
    await expect(settings.updatePaymentText(CUSTOMER_ID, 'pay me')).rejects.toThrow(UnauthorizedError);
    expect(stores.settings.values.size).toBe(0);
  });

  it('should split stored method lists', () => {
    expect(splitPaymentMethods(' KBZPay, ,COD ')).toEqual(['KBZPay', 'COD']);
  });
});
