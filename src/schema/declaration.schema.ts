import { z } from 'zod';
import type { DeclarationNode, DeclarationNodeInput } from '../types';

/**
 * 声明树的结构校验（只看形状，不做命名检查）。
 */

/**
 * 声明种类：
 * - 类型：class / interface / enum / annotation_type / record
 * - 可执行体：method / constructor / static_init / instance_init
 * - 变量：field / enum_constant / parameter / local_variable / exception_parameter / resource_variable
 * - type_parameter：会被遍历，但不参与命名检查
 */
export const DeclarationKindSchema = z.enum([
  'class',
  'interface',
  'enum',
  'annotation_type',
  'record',
  'method',
  'constructor',
  'static_init',
  'instance_init',
  'field',
  'enum_constant',
  'parameter',
  'local_variable',
  'exception_parameter',
  'resource_variable',
  'type_parameter',
]);

export const ModifierSchema = z.enum([
  'public',
  'protected',
  'private',
  'abstract',
  'default',
  'static',
  'final',
  'transient',
  'volatile',
  'synchronized',
  'native',
  'strictfp',
  'sealed',
  'non_sealed',
]);

export type DeclarationKind = z.infer<typeof DeclarationKindSchema>;
export type Modifier = z.infer<typeof ModifierSchema>;

export const DeclarationNodeSchema: z.ZodType<DeclarationNode, z.ZodTypeDef, DeclarationNodeInput> = z.lazy(() =>
  z
    .object({
      kind: DeclarationKindSchema,
      simple_name: z.string(),
      modifiers: z.array(ModifierSchema).default([]),
      enclosing_kind: DeclarationKindSchema.optional(),
      enclosing_name: z.string().optional(),
      constant_value_known: z.boolean().default(false),
      children: z.array(DeclarationNodeSchema).default([]),
    })
    .superRefine((node, ctx) => {
      // modifiers 是集合语义
      const seen = new Set<Modifier>();
      node.modifiers.forEach((m, i) => {
        if (seen.has(m)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `duplicate modifier '${m}'`,
            path: ['modifiers', i],
          });
        }
        seen.add(m);
      });
    })
);

/** 声明森林：根节点的有序列表 */
export const DeclarationForestSchema = z.array(DeclarationNodeSchema);

export function parse_declarations(input: unknown) {
  return DeclarationForestSchema.safeParse(input);
}
