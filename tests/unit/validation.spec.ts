import { faker } from '@faker-js/faker';

import { validateEvent } from '../../src/validators/event.validator';
import { validateEventType } from '../../src/validators/event-type.validator';
import { ValidationError } from '../../src/errors/validation.error';
import type { ValidationReason } from '../../src/errors/validation.error';

function fakeValidEvent(): Record<string, unknown> {
  return {
    type: faker.helpers.arrayElement(['purchase', 'add_to_cart', 'page_view', 'refund']),
    value: faker.number.float({ min: 0, max: 1000, fractionDigits: 2 }),
    occurred_at: '2020-10-06 10:02:05',
  };
}

function reasonOf(fn: () => unknown): ValidationReason {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.reason;
    }

    throw error;
  }

  throw new Error('expected a ValidationError');
}

describe('validateEvent', () => {
  describe('valid input', () => {
    it('should return a typed event for a valid body', () => {
      // Arrange
      const body = fakeValidEvent();

      // Act
      const result = validateEvent(JSON.stringify(body));

      // Assert
      expect(result).toEqual({
        type: body['type'],
        value: body['value'],
        occurredAt: new Date('2020-10-06T10:02:05Z'),
      });
    });

    it('should accept a UTF-8 byte buffer', () => {
      // Arrange
      const body = { type: 'purchase', value: 650, occurred_at: '2020-10-06 10:02:05' };

      // Act
      const result = validateEvent(Buffer.from(JSON.stringify(body), 'utf-8'));

      // Assert
      expect(result.type).toBe('purchase');
      expect(result.value).toBe(650);
    });

    it('should accept integer, decimal and negative values', () => {
      // Act & Assert
      expect(validateEvent(JSON.stringify({ ...fakeValidEvent(), value: 3 })).value).toBe(3);
      expect(validateEvent(JSON.stringify({ ...fakeValidEvent(), value: 0.5 })).value).toBe(0.5);
      expect(validateEvent(JSON.stringify({ ...fakeValidEvent(), value: -12.25 })).value).toBe(
        -12.25,
      );
    });

    it('should accept an ISO separator in occurred_at', () => {
      // Arrange
      const body = { ...fakeValidEvent(), occurred_at: '2024-02-29T23:59:59' };

      // Act
      const result = validateEvent(JSON.stringify(body));

      // Assert
      expect(result.occurredAt.toISOString()).toBe('2024-02-29T23:59:59.000Z');
    });

    it('should ignore unknown fields', () => {
      // Arrange
      const body = { type: 'purchase', value: 10, occurred_at: '2020-10-06 10:02:05', sku: 'A-1' };

      // Act
      const result = validateEvent(JSON.stringify(body));

      // Assert
      expect(result).toEqual({
        type: 'purchase',
        value: 10,
        occurredAt: new Date('2020-10-06T10:02:05Z'),
      });
    });

    it('should accept a type of exactly 256 characters', () => {
      // Arrange
      const type = faker.string.alpha(256);

      // Act & Assert
      expect(validateEvent(JSON.stringify({ ...fakeValidEvent(), type })).type).toBe(type);
    });
  });

  describe('malformed encoding', () => {
    it.each(['not-json{{{', '', '{"type": "purchase"'])('should reject %p', (body) => {
      // Act & Assert
      expect(reasonOf(() => validateEvent(body))).toEqual({ kind: 'malformed-encoding' });
    });

    it.each(['null', '[]', '42', '"purchase"', 'true'])(
      'should reject the non-object JSON value %s',
      (body) => {
        // Act & Assert
        expect(reasonOf(() => validateEvent(body))).toEqual({ kind: 'malformed-encoding' });
      },
    );

    it('should reject bytes that are not valid UTF-8', () => {
      // Arrange
      const body = Buffer.from([0x7b, 0xff, 0xfe, 0x7d]);

      // Act & Assert
      expect(reasonOf(() => validateEvent(body))).toEqual({ kind: 'malformed-encoding' });
    });

    it('should throw a ValidationError instance', () => {
      // Act & Assert
      expect(() => validateEvent('not-json')).toThrow(ValidationError);
      expect(() => validateEvent('not-json')).toThrow('message body is not valid JSON');
    });
  });

  describe('missing fields', () => {
    it.each(['type', 'value', 'occurred_at'])('should report %s when absent', (field) => {
      // Arrange
      const { [field]: _, ...body } = fakeValidEvent();

      // Act & Assert
      expect(reasonOf(() => validateEvent(JSON.stringify(body)))).toEqual({
        kind: 'missing-field',
        field,
      });
    });

    it('should treat null as missing', () => {
      // Arrange
      const body = { ...fakeValidEvent(), value: null };

      // Act & Assert
      expect(reasonOf(() => validateEvent(JSON.stringify(body)))).toEqual({
        kind: 'missing-field',
        field: 'value',
      });
    });

    it('should report the first missing field for an empty object', () => {
      // Act & Assert
      expect(reasonOf(() => validateEvent('{}'))).toEqual({ kind: 'missing-field', field: 'type' });
    });

    it('should name the field in the message', () => {
      // Arrange
      const { occurred_at: _, ...body } = fakeValidEvent();

      // Act & Assert
      expect(() => validateEvent(JSON.stringify(body))).toThrow('occurred_at is required');
    });
  });

  describe('invalid values', () => {
    it.each<[string, unknown]>([
      ['type', ''],
      ['type', 42],
      ['type', 'purchase\n'],
      ['type', 'x'.repeat(257)],
      ['value', '12.5'],
      ['value', true],
      ['value', { amount: 1 }],
      ['occurred_at', '2020-02-30 10:00:00'],
      ['occurred_at', '2020-10-06'],
      ['occurred_at', '2020-10-06 24:00:00'],
      ['occurred_at', '06/10/2020 10:02:05'],
      ['occurred_at', 1601978525],
    ])('should reject %s = %p', (field, value) => {
      // Arrange
      const body = { ...fakeValidEvent(), [field]: value };

      // Act & Assert
      expect(reasonOf(() => validateEvent(JSON.stringify(body)))).toEqual({
        kind: 'invalid-value',
        field,
      });
    });

    it('should use the schema message', () => {
      // Arrange
      const body = { ...fakeValidEvent(), value: 'a lot' };

      // Act & Assert
      expect(() => validateEvent(JSON.stringify(body))).toThrow('value must be a finite number');
    });
  });
});

describe('validateEventType', () => {
  it('should return a valid event type unchanged', () => {
    // Act & Assert
    expect(validateEventType('purchase')).toBe('purchase');
  });

  it.each<unknown>(['', undefined, 'a\u0000b'])('should reject %p', (input) => {
    // Act & Assert
    expect(reasonOf(() => validateEventType(input))).toEqual({
      kind: 'invalid-value',
      field: 'type',
    });
  });
});
