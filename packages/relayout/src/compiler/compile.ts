import type * as Ir from "#ir";
import { pass as validationPass } from "#ir";
import { pass as parsingPass } from "#parser";
import {
  pass as layoutPass,
  type LayoutOptions,
  type Transformation,
} from "#optimizer";
import { Result, Severity, type MessagesBySeverity } from "#result";
import type { CompilerError } from "#errors";

export type CompileTarget = "ir" | "optimized";

export interface CompileOptions {
  source: string;
  sourcePath?: string;
  /** Stop after validation, or run the layout pass as well */
  target: CompileTarget;
  layout?: LayoutOptions;
}

export interface CompileOutput {
  ir: Ir.Module;
  /** Changes made by the layout pass, when it ran */
  transformations: Transformation[];
}

/**
 * Parse, validate and optionally optimize a module. The optimized module is
 * validated again before it is returned.
 */
export async function compile(
  options: CompileOptions,
): Promise<Result<CompileOutput, CompilerError>> {
  const warnings: CompilerError[] = [];
  const collect = (messages: MessagesBySeverity<CompilerError>) => {
    warnings.push(...(messages[Severity.Warning] ?? []));
  };

  const parsed = await parsingPass.run({
    source: options.source,
    sourcePath: options.sourcePath,
  });
  if (!parsed.success) return parsed;
  collect(parsed.messages);

  const validated = await validationPass.run(parsed.value);
  if (!validated.success) return validated;
  collect(validated.messages);

  if (options.target === "ir") {
    return Result.okWith(
      { ir: validated.value.ir, transformations: [] },
      { [Severity.Warning]: warnings },
    );
  }

  const optimized = await layoutPass.run({
    ir: validated.value.ir,
    layout: options.layout,
  });
  if (!optimized.success) return optimized;
  collect(optimized.messages);

  const revalidated = await validationPass.run({ ir: optimized.value.ir });
  if (!revalidated.success) return revalidated;
  collect(revalidated.messages);

  return Result.okWith(
    {
      ir: revalidated.value.ir,
      transformations: optimized.value.transformations,
    },
    { [Severity.Warning]: warnings },
  );
}
