import { buildASTSchema, parse, type GraphQLSchema } from 'graphql';

/**
 * Builds a schema from SDL for inspection of its mutation root.
 *
 * SDL validation is skipped so subgraph documents (federation directives,
 * `extend schema @link(...)`) load without their directive definitions.
 */
export function loadSchemaFromSDL(sdl: string): GraphQLSchema {
  return buildASTSchema(parse(sdl), { assumeValidSDL: true });
}
