/**
 * Read-only bag of environment facts handed to the diagnosis prompt builder.
 * The pipeline only reads these fields; collectors live in the CLI package.
 */

export interface FileContext {
  readonly files: readonly string[];
  readonly dirs: readonly string[];
  readonly fileContents: Readonly<Record<string, string>>;
}

export interface ErrorContext {
  readonly command: string;
  readonly errorOutput: string;
  readonly cwd: string;
  readonly exitCode: number;
  readonly history: readonly string[];
  readonly relevantFiles: readonly string[];
  readonly manExcerpt: string;
  readonly os: string;
  readonly referencedFiles?: readonly string[];
  readonly envVars?: Readonly<Record<string, string>>;
  readonly fileContext?: FileContext;
  readonly processTree?: readonly string[];
  readonly networkState?: readonly string[];
  readonly gitStatus?: string;
  readonly gitRemotes?: string;
  readonly dockerContainers?: readonly string[];
  readonly composeFiles?: readonly string[];
  readonly availableUpdates?: readonly string[];
  readonly failedServices?: readonly string[];
}

/**
 * Facts used when generating a command from a natural-language request.
 */
export interface GenerationContext {
  readonly os: string;
  readonly cwd: string;
  readonly git: boolean;
  readonly history: readonly string[];
}
