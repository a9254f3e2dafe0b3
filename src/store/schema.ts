import { z } from 'zod';

export const LogLevelZ = z.enum(['debug', 'info', 'warn', 'error']);
export const OutputModeZ = z.enum(['text', 'json']);

export const ConfigZ = z
	.object({
		logLevel: LogLevelZ.optional(),
		// default for `parse --partial`
		partial: z.boolean().optional(),
		helpMarkers: z.array(z.string().regex(/^-/)).min(1).optional(),
		prog: z.string().min(1).optional(),
		output: OutputModeZ.optional(),
	})
	.strict();

export type NestArgsConfig = z.infer<typeof ConfigZ>;
export type OutputMode = z.infer<typeof OutputModeZ>;

/** `"int"`, `{ array: T }` or `{ struct: { field: T } }`. */
export type TypeDef =
	| string
	| { array: TypeDef }
	| { struct: Record<string, TypeDef> };

export const TypeDefZ: z.ZodType<TypeDef> = z.lazy(() =>
	z.union([
		z.string().min(1),
		z.object({ array: TypeDefZ }).strict(),
		z.object({ struct: z.record(z.string(), TypeDefZ) }).strict(),
	])
);

export const OptionDefZ = z
	.object({
		short: z.string().optional(),
		long: z.string().optional(),
		name: z.string().optional(),
		type: TypeDefZ.optional(),
		// scalars may be written bare; compound defaults as quoted literals
		default: z.union([z.string(), z.number(), z.boolean()]).optional(),
		description: z.string().optional(),
	})
	.strict();

export const ArgumentDefZ = z
	.object({
		name: z.string(),
		type: TypeDefZ.optional(),
		description: z.string().optional(),
	})
	.strict();

export const CommandDefZ = z
	.object({
		description: z.string().optional(),
		options: z.array(OptionDefZ).optional(),
		arguments: z.array(ArgumentDefZ).optional(),
	})
	.strict();

export type OptionDef = z.infer<typeof OptionDefZ>;
export type ArgumentDef = z.infer<typeof ArgumentDefZ>;
export type CommandDef = z.infer<typeof CommandDefZ>;

export interface GroupDef {
	description?: string;
	options?: OptionDef[];
	groups?: Record<string, GroupDef>;
	commands?: Record<string, CommandDef>;
}

export const GroupDefZ: z.ZodType<GroupDef> = z.lazy(() =>
	z
		.object({
			description: z.string().optional(),
			options: z.array(OptionDefZ).optional(),
			groups: z.record(z.string(), GroupDefZ).optional(),
			commands: z.record(z.string(), CommandDefZ).optional(),
		})
		.strict()
);

export const TreeDefZ = z
	.object({
		prog: z.string().min(1).optional(),
		description: z.string().optional(),
		helpMarkers: z.array(z.string()).optional(),
		options: z.array(OptionDefZ).optional(),
		groups: z.record(z.string(), GroupDefZ).optional(),
		commands: z.record(z.string(), CommandDefZ).optional(),
	})
	.strict();

export type TreeDef = z.infer<typeof TreeDefZ>;

export function formatZodIssues(e: z.ZodError): string {
	return e.issues
		.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
		.join('; ');
}
