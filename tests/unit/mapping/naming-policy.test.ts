import { describe, it, expect } from 'vitest';
import { NamingPolicyViolationError } from '../../../src/mapping/errors.js';
import { NamingPolicy, toPascalCase } from '../../../src/mapping/naming-policy.js';
import { loadSchemaFromSDL } from '../../../src/mapping/schema-loader.js';
import { loanOriginationSDL } from '../../fixtures/loan-origination.js';

describe('toPascalCase', () => {
  it('should upper-case the first character', () => {
    expect(toPascalCase('recordLoanRequested')).toBe('RecordLoanRequested');
  });

  it('should join underscore-separated segments', () => {
    expect(toPascalCase('record_loan')).toBe('RecordLoan');
    expect(toPascalCase('__record__loan_')).toBe('RecordLoan');
  });

  it('should return a name made only of underscores unchanged', () => {
    expect(toPascalCase('___')).toBe('___');
  });
});

describe('NamingPolicy', () => {
  const policy = new NamingPolicy();

  it('should derive the default stream and event type', () => {
    expect(policy.derive('recordLoanRequested')).toEqual({
      streamName: 'graphql-mutation-recordLoanRequested',
      eventType: 'GraphQL.RecordLoanRequested',
    });
  });

  it('should be deterministic', () => {
    expect(policy.derive('recordCreditChecked')).toEqual(policy.derive('recordCreditChecked'));
  });

  it('should give distinct fields distinct streams', () => {
    expect(policy.streamName('recordCreditChecked')).not.toBe(policy.streamName('recordAutomatedSummary'));
  });

  it('should honor a configured prefix and namespace', () => {
    const custom = new NamingPolicy({ streamPrefix: 'loans-', eventTypeNamespace: 'Loans' });

    expect(custom.derive('recordCreditChecked')).toEqual({
      streamName: 'loans-recordCreditChecked',
      eventType: 'Loans.RecordCreditChecked',
    });
  });

  it('should omit the separator for an empty namespace', () => {
    expect(new NamingPolicy({ eventTypeNamespace: '' }).eventType('recordLoan')).toBe('RecordLoan');
  });

  it('should reject an empty field name', () => {
    expect(() => policy.streamName('')).toThrow(TypeError);
    expect(() => policy.eventType('')).toThrow('Mutation field name must not be empty');
  });

  describe('validate', () => {
    it('should build the mapping table in input order', () => {
      expect(policy.validate(['recordCreditChecked', 'recordAutomatedSummary'])).toEqual([
        {
          fieldName: 'recordCreditChecked',
          streamName: 'graphql-mutation-recordCreditChecked',
          eventType: 'GraphQL.RecordCreditChecked',
        },
        {
          fieldName: 'recordAutomatedSummary',
          streamName: 'graphql-mutation-recordAutomatedSummary',
          eventType: 'GraphQL.RecordAutomatedSummary',
        },
      ]);
    });

    it('should ignore repeated names', () => {
      expect(policy.validate(['recordLoan', 'recordLoan'])).toHaveLength(1);
    });

    it('should report every colliding pair', () => {
      try {
        policy.validate(['record_loan', 'recordLoan', 'close_loan', 'closeLoan', 'openLoan']);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(NamingPolicyViolationError);
        if (!(err instanceof NamingPolicyViolationError)) return;
        expect(err.collisions).toEqual([
          { eventType: 'GraphQL.RecordLoan', fields: ['record_loan', 'recordLoan'] },
          { eventType: 'GraphQL.CloseLoan', fields: ['close_loan', 'closeLoan'] },
        ]);
        expect(err.message).toBe(
          'Mutation naming policy violated: "record_loan" and "recordLoan" both map to GraphQL.RecordLoan; '
          + '"close_loan" and "closeLoan" both map to GraphQL.CloseLoan',
        );
      }
    });
  });

  describe('validateSchema', () => {
    it('should list the mutation fields of a schema', () => {
      const table = policy.validateSchema(loadSchemaFromSDL(loanOriginationSDL));

      expect(table.map((entry) => entry.fieldName)).toEqual([
        'recordLoanRequested',
        'recordCreditChecked',
        'recordAutomatedSummary',
      ]);
    });

    it('should return an empty table for a schema without mutations', () => {
      expect(policy.validateSchema(loadSchemaFromSDL('type Query { ping: String }'))).toEqual([]);
    });

    it('should fail on colliding mutation fields', () => {
      const schema = loadSchemaFromSDL(`
        type Query { ping: String }
        type Mutation { record_loan: ID recordLoan: ID }
      `);

      expect(() => policy.validateSchema(schema)).toThrow(NamingPolicyViolationError);
    });
  });
});
