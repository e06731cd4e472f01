export {
  check,
  check_all,
  check_camel_case,
  check_all_caps,
  is_heuristically_constant,
  convention_of,
  check_convention,
  category_of,
  ConventionKind,
} from './checker';
export type { ConstantFacts, DeclarationCategory } from './checker';
export { parse_declarations, DeclarationNodeSchema, DeclarationForestSchema } from './schema';
export type { DeclarationKind, Modifier } from './schema';
export type * from './types';
