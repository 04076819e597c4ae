import { MessageValidator, FieldError } from '../../src';

const locations = (errors: FieldError[]): string[] =>
  Array.from(new Set(errors.map((e) => e.location))).sort();

describe('MessageValidator', () => {
  const validator = new MessageValidator();

  const validPayload = {
    message_id: 'm1',
    from: '+919876543210',
    to: '+14155550100',
    ts: '2025-01-15T10:00:00Z',
    text: 'Hello',
  };

  describe('valid payloads', () => {
    it('should map wire fields to a candidate', () => {
      const result = validator.validate(validPayload);

      expect(result.valid).toBe(true);
      if (!result.valid) return;

      expect(result.candidate).toEqual({
        messageId: 'm1',
        fromAddress: '+919876543210',
        toAddress: '+14155550100',
        timestamp: new Date(Date.UTC(2025, 0, 15, 10, 0, 0)),
        text: 'Hello',
      });
    });

    it('should treat absent and null text as no text', () => {
      const { text: _text, ...withoutText } = validPayload;

      const absent = validator.validate(withoutText);
      const explicitNull = validator.validate({ ...validPayload, text: null });

      expect(absent.valid && absent.candidate.text).toBeNull();
      expect(explicitNull.valid && explicitNull.candidate.text).toBeNull();
    });

    it('should ignore unknown fields', () => {
      const result = validator.validate({ ...validPayload, extra: { a: 1 } });

      expect(result.valid).toBe(true);
    });

    it('should truncate fractional seconds to milliseconds', () => {
      const result = validator.validate({
        ...validPayload,
        ts: '2025-01-15T10:00:00.123456Z',
      });

      expect(result.valid).toBe(true);
      if (!result.valid) return;
      expect(result.candidate.timestamp.toISOString()).toBe(
        '2025-01-15T10:00:00.123Z',
      );
    });

    it('should count text length in code points', () => {
      const emoji = '\u{1F600}'.repeat(4096);

      expect(validator.validate({ ...validPayload, text: emoji }).valid).toBe(
        true,
      );
      expect(
        validator.validate({ ...validPayload, text: 'a'.repeat(4096) }).valid,
      ).toBe(true);
    });
  });

  describe('invalid payloads', () => {
    it('should reject an empty message_id', () => {
      const result = validator.validate({ ...validPayload, message_id: '' });

      expect(result).toEqual({
        valid: false,
        errors: [
          { location: 'message_id', message: 'message_id should not be empty' },
        ],
      });
    });

    it('should reject a sender that is not + followed by digits', () => {
      const result = validator.validate({ ...validPayload, from: '919876543210' });

      expect(result).toEqual({
        valid: false,
        errors: [
          { location: 'from', message: 'from must be + followed by digits' },
        ],
      });
    });

    it.each([
      ['missing zone', '2025-01-15T10:00:00'],
      ['numeric offset', '2025-01-15T10:00:00+05:30'],
      ['impossible date', '2025-02-30T10:00:00Z'],
      ['not a timestamp', 'yesterday'],
    ])('should reject a ts with %s', (_label, ts) => {
      const result = validator.validate({ ...validPayload, ts });

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(locations(result.errors)).toEqual(['ts']);
    });

    it('should reject text longer than 4096 code points', () => {
      const result = validator.validate({
        ...validPayload,
        text: 'a'.repeat(4097),
      });

      expect(result).toEqual({
        valid: false,
        errors: [
          { location: 'text', message: 'text must be at most 4096 characters' },
        ],
      });
    });

    it('should reject non-string field values', () => {
      const result = validator.validate({ ...validPayload, message_id: 123 });

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.errors).toContainEqual({
        location: 'message_id',
        message: 'message_id must be a string',
      });
    });

    it('should report every violated field at once', () => {
      const result = validator.validate({
        message_id: 'm1',
        from: 'abc',
        to: '+1-415',
        ts: '2025-01-15 10:00:00',
      });

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(locations(result.errors)).toEqual(['from', 'to', 'ts']);
      expect(result.errors.length).toBeGreaterThanOrEqual(3);
    });

    it('should report every missing required field', () => {
      const result = validator.validate({});

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(locations(result.errors)).toEqual(['from', 'message_id', 'to', 'ts']);
    });
  });

  describe('parse', () => {
    it('should validate a JSON body', () => {
      const result = validator.parse(
        Buffer.from(JSON.stringify(validPayload), 'utf8'),
      );

      expect(result.valid).toBe(true);
    });

    it('should report malformed JSON against the body', () => {
      const result = validator.parse(Buffer.from('{"message_id":', 'utf8'));

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].location).toBe('body');
      expect(result.errors[0].message).toMatch(/^invalid JSON: /);
    });

    it.each([
      ['an array', '[1, 2]'],
      ['a string', '"m1"'],
      ['null', 'null'],
    ])('should reject %s as the body', (_label, body) => {
      expect(validator.parse(Buffer.from(body, 'utf8'))).toEqual({
        valid: false,
        errors: [{ location: 'body', message: 'body must be a JSON object' }],
      });
    });
  });
});
