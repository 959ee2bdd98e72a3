/** Thrown when a skill directory's SKILL.md exists but cannot be read. */
export class SkillLoadError extends Error {
  constructor(
    public readonly dir: string,
    cause?: unknown,
  ) {
    super(`Failed to load skill from ${dir}${cause instanceof Error ? `: ${cause.message}` : ''}`);
    this.name = 'SkillLoadError';
    this.cause = cause;
  }
}

/** Thrown when an explicitly requested skills root does not exist. */
export class SkillsRootNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Skills directory not found: ${path}`);
    this.name = 'SkillsRootNotFoundError';
  }
}

/** Thrown by the flowchart parser; the loader turns it into a standard-skill fallback. */
export class FlowParseError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = 'FlowParseError';
  }
}
