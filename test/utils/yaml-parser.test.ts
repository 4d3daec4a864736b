import { describe, it, expect } from 'vitest';
import { parseJsonDocument, parseYamlDocument, YAML_LIMITS } from '../../src/utils/yaml-parser.js';
import Decimal from 'decimal.js';
import { ValidationError } from '../../src/errors/types.js';

describe('utils/yaml-parser', () => {
  describe('parseYamlDocument', () => {
    it('should parse a scenario catalogue', () => {
      const yaml = `
scenarios:
  - id: insert-basic
    commands:
      - name: insert
        payload: { insert: users, documents: [{ _id: 1 }] }
`;
      expect(parseYamlDocument(yaml, 'catalogue.yaml')).toEqual({
        scenarios: [
          {
            id: 'insert-basic',
            commands: [{ name: 'insert', payload: { insert: 'users', documents: [{ _id: 1 }] } }],
          },
        ],
      });
    });

    it('should parse JSON documents', () => {
      expect(parseYamlDocument('{"corpus": {"size": 10}}', 'paritykit.json')).toEqual({ corpus: { size: 10 } });
    });

    it('should parse empty input as null', () => {
      expect(parseYamlDocument('', 'empty.yaml')).toBeNull();
    });

    it('should name the source in syntax errors', () => {
      expect(() => parseYamlDocument('key: [unclosed', 'broken.yaml')).toThrow(ValidationError);
      expect(() => parseYamlDocument('key: [unclosed', 'broken.yaml')).toThrow(/^Invalid YAML in broken\.yaml: /);
    });

    it('should allow a few aliases', () => {
      const yaml = `
base: &base { plan: free }
first: *base
second: *base
`;
      expect(parseYamlDocument(yaml, 'aliases.yaml')).toEqual({
        base: { plan: 'free' },
        first: { plan: 'free' },
        second: { plan: 'free' },
      });
    });

    it('should reject excessive aliases', () => {
      const lines = ['base: &base {x: 1}'];
      for (let i = 0; i < 150; i++) {
        lines.push(`item${i}: *base`);
      }

      expect(() => parseYamlDocument(lines.join('\n'), 'bomb.yaml')).toThrow(/^Invalid YAML in bomb\.yaml/);
    });

    it('should reject excessive nesting depth', () => {
      let yaml = 'root:';
      for (let i = 0; i < 80; i++) {
        yaml += '\n' + '  '.repeat(i + 1) + `level${i}:`;
      }
      yaml += '\n' + '  '.repeat(81) + 'value: deep';

      expect(() => parseYamlDocument(yaml, 'deep.yaml')).toThrow(
        `deep.yaml: nesting depth exceeds maximum of ${YAML_LIMITS.MAX_DEPTH}`
      );
    });

    it('should reject oversized input', () => {
      const yaml = 'x'.repeat(YAML_LIMITS.MAX_INPUT_SIZE + 1);

      expect(() => parseYamlDocument(yaml, 'huge.yaml')).toThrow(/^huge\.yaml: input size/);
    });
  });

  describe('parseYamlDocument with losslessNumbers', () => {
    const yaml = 'big: 9007199254740993\nsmall: 12\nratio: 0.25\nlong: 0.12345678901234567891\nquoted: "9007199254740993"\n';

    it('should keep integers beyond 2^53 and long fractions exact', () => {
      expect(parseYamlDocument(yaml, 'numbers.yaml', { losslessNumbers: true })).toEqual({
        big: 9007199254740993n,
        small: 12,
        ratio: 0.25,
        long: new Decimal('0.12345678901234567891'),
        quoted: '9007199254740993',
      });
    });

    it('should round to doubles without the option', () => {
      expect(parseYamlDocument('big: 9007199254740993\n', 'numbers.yaml')).toEqual({ big: 9007199254740992 });
    });
  });

  describe('parseJsonDocument', () => {
    it('should keep every digit of numbers', () => {
      expect(parseJsonDocument('{"n":9007199254740993,"f":1.5,"s":"x","l":[1,2]}', 'reply')).toEqual({
        n: 9007199254740993n,
        f: 1.5,
        s: 'x',
        l: [1, 2],
      });
    });

    it('should keep the last value of a duplicate key', () => {
      expect(parseJsonDocument('{"a":1,"a":2}', 'reply')).toEqual({ a: 2 });
    });

    it('should keep a __proto__ key as an own property', () => {
      const doc = parseJsonDocument('{"__proto__":{"x":1}}', 'reply');

      expect(typeof doc === 'object' && doc !== null && Object.hasOwn(doc, '__proto__')).toBe(true);
      expect(Object.getPrototypeOf(doc)).toBe(Object.prototype);
    });

    it('should reject malformed JSON and YAML-only syntax', () => {
      expect(() => parseJsonDocument('not json', 'reply')).toThrow(/^Invalid JSON in reply: /);
      expect(() => parseJsonDocument('a: 1', 'reply')).toThrow(ValidationError);
    });
  });
});
