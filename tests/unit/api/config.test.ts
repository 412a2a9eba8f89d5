import { describe, it, expect } from 'vitest';
import { resolveConfig, resolveGraphQLConfig } from '../../../src/api/config.js';

describe('Server Config', () => {
  describe('resolveConfig', () => {
    it('uses default values when no input provided', () => {
      const config = resolveConfig();

      expect(config.port).toBe(4000);
      expect(config.host).toBe('0.0.0.0');
      expect(config.logger).toBe(true);
      expect(config.fastifyOptions).toBeUndefined();
    });

    it('overrides specific values', () => {
      const config = resolveConfig({ port: 8080, logger: false });

      expect(config.port).toBe(8080);
      expect(config.logger).toBe(false);
      expect(config.host).toBe('0.0.0.0');
    });

    it('preserves fastify options', () => {
      const fastifyOptions = { trustProxy: true, bodyLimit: 2048 };

      expect(resolveConfig({ fastifyOptions }).fastifyOptions).toEqual(fastifyOptions);
    });
  });

  describe('resolveGraphQLConfig', () => {
    it('uses defaults when undefined', () => {
      expect(resolveGraphQLConfig(undefined)).toEqual({
        graphiql: true,
        path: '/graphql',
        dispatchPolicy: 'resolved',
        loanIdResultFields: ['recordLoanRequested'],
      });
    });

    it('merges partial input with defaults', () => {
      expect(resolveGraphQLConfig({ graphiql: false, dispatchPolicy: 'always' })).toEqual({
        graphiql: false,
        path: '/graphql',
        dispatchPolicy: 'always',
        loanIdResultFields: ['recordLoanRequested'],
      });
    });

    it('replaces the loan id result fields', () => {
      expect(resolveGraphQLConfig({ loanIdResultFields: ['openLoan'] }).loanIdResultFields).toEqual(['openLoan']);
      expect(resolveGraphQLConfig({ loanIdResultFields: [] }).loanIdResultFields).toEqual([]);
    });
  });
});
