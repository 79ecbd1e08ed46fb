import { z } from 'zod';

import { ConfigurationError } from '../errors.js';
import { toRadians } from '../geometry/vector.js';

// Navigator settings. Angles are radians; distances share the layout's unit.
export const NavigatorKindSchema = z.enum(['perfect', 'wandering']);

export const BoundaryPolicySchema = z.enum(['terminate', 'block']);

export const NavigatorConfigSchema = z.object({
  kind: NavigatorKindSchema.default('perfect'),
  stepDistance: z.number().positive().finite().default(50),
  rotationLimit: z.number().positive().max(Math.PI).default(toRadians(5)),
  headingTolerance: z.number().nonnegative().max(Math.PI).default(toRadians(5)),
  targetTolerance: z.number().positive().finite().default(50),
  maxActions: z.number().int().positive().default(50),
  boundaryPolicy: BoundaryPolicySchema.default('terminate'),
  // Wandering only
  maxDeviation: z.number().nonnegative().max(Math.PI).default(0),
  randomActionChance: z.number().min(0).max(1).default(0),
  seed: z.union([z.number(), z.string()]).optional(),
});
export type NavigatorConfig = z.infer<typeof NavigatorConfigSchema>;
export type NavigatorConfigInput = z.input<typeof NavigatorConfigSchema>;

// How poses are mirrored to an external renderer
export const MirrorPolicySchema = z.object({
  timeoutMs: z.number().int().positive().default(5000),
  retries: z.number().int().nonnegative().default(2),
  retryDelayMs: z.number().nonnegative().default(250),
});
export type MirrorPolicy = z.infer<typeof MirrorPolicySchema>;
export type MirrorPolicyInput = z.input<typeof MirrorPolicySchema>;

// Corridor layout files
const PointSchema = z
  .tuple([z.number().finite(), z.number().finite()])
  .transform(([x, y]) => ({ x, y }));

export const CornerBoxSchema = z.object({
  corners: z.array(PointSchema).min(3).max(4),
  target: PointSchema,
  /** Degrees, about the origin */
  rotation: z.number().finite().default(0),
});

export const AlignedBoxSchema = z.object({
  aligned: z
    .object({
      left: z.number().finite(),
      right: z.number().finite(),
      lower: z.number().finite(),
      upper: z.number().finite(),
    })
    .refine((bounds) => bounds.right > bounds.left && bounds.upper > bounds.lower, {
      message: 'right must exceed left and upper must exceed lower',
    }),
  target: PointSchema,
  rotation: z.number().finite().default(0),
});

export const BoxSpecSchema = z.union([CornerBoxSchema, AlignedBoxSchema]);
export type BoxSpec = z.infer<typeof BoxSpecSchema>;

export const StartPoseSchema = z.object({
  position: PointSchema,
  headingDegrees: z.number().finite().default(0),
});

export const LayoutSchema = z.object({
  name: z.string().optional(),
  boxes: z.array(BoxSpecSchema).min(1),
  start: StartPoseSchema.optional(),
});
export type Layout = z.infer<typeof LayoutSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function parseWith<Schema extends z.ZodTypeAny>(schema: Schema, data: unknown, label: string): z.infer<Schema> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${label}`, formatIssues(result.error));
  }
  return result.data;
}

export function parseNavigatorConfig(data: NavigatorConfigInput = {}): NavigatorConfig {
  return parseWith(NavigatorConfigSchema, data, 'navigator configuration');
}

export function parseMirrorPolicy(data: MirrorPolicyInput = {}): MirrorPolicy {
  return parseWith(MirrorPolicySchema, data, 'mirror policy');
}

export function parseLayout(data: unknown): Layout {
  return parseWith(LayoutSchema, data, 'corridor layout');
}
