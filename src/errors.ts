export interface SourceLocation {
  source?: string | undefined;
  offset?: number | undefined;
  row?: number | undefined;
  column?: number | undefined;
  lineText?: string | undefined;
}

export class TomlError extends Error {
  readonly description: string;
  source?: string | undefined;
  offset?: number | undefined;
  row?: number | undefined;
  column?: number | undefined;
  lineText?: string | undefined;

  constructor(description: string, location: SourceLocation = {}) {
    super(formatTomlErrorMessage(description, location));
    this.name = 'TomlError';
    this.description = description;
    this.assignLocation(location);
  }

  get hasLocation(): boolean {
    return typeof this.offset === 'number';
  }

  /**
   * Attaches a location to an error raised where none was known (the data
   * model has no notion of source positions) and rebuilds the message.
   */
  locate(location: SourceLocation): this {
    this.assignLocation(location);
    this.message = formatTomlErrorMessage(this.description, location);
    return this;
  }

  private assignLocation(location: SourceLocation): void {
    this.source = location.source;
    this.offset = location.offset;
    this.row = location.row;
    this.column = location.column;
    this.lineText = location.lineText;
  }
}

export interface SyntaxErrorDetails {
  expected?: readonly string[];
  rules?: readonly string[];
}

export class TomlSyntaxError extends TomlError {
  readonly expected: readonly string[];
  readonly rules: readonly string[];

  constructor(description: string, location: SourceLocation = {}, details: SyntaxErrorDetails = {}) {
    super(description, location);
    this.name = 'TomlSyntaxError';
    this.expected = details.expected ?? [];
    this.rules = details.rules ?? [];
  }

  /** Rule stack active at the failure point, outermost first. */
  formatTrace(): string {
    return this.rules.join(' / ');
  }
}

export class TomlKeyError extends TomlError {
  constructor(description: string, location: SourceLocation = {}) {
    super(description, location);
    this.name = 'TomlKeyError';
  }
}

export class EmptyKeyError extends TomlKeyError {
  constructor(location: SourceLocation = {}) {
    super('Path must be non-empty', location);
    this.name = 'EmptyKeyError';
  }
}

export class DuplicateKeyError extends TomlKeyError {
  readonly path: readonly string[];

  constructor(path: readonly string[], location: SourceLocation = {}) {
    super(`Key has already been set: ${path.join('.')}`, location);
    this.name = 'DuplicateKeyError';
    this.path = path;
  }
}

/** Anything with a kind and a plain rendering; kept structural to avoid a cycle with values.ts. */
export interface DescribedValue {
  readonly kind: string;
  describe(): string;
}

export class HeterogeneousArrayError extends TomlError {
  readonly first: DescribedValue;
  readonly last: DescribedValue;

  constructor(first: DescribedValue, last: DescribedValue, location: SourceLocation = {}) {
    super(
      `Array elements must be of the same type: ${first.describe()} (${first.kind}), ${last.describe()} (${last.kind})`,
      location,
    );
    this.name = 'HeterogeneousArrayError';
    this.first = first;
    this.last = last;
  }
}

function formatTomlErrorMessage(description: string, location: SourceLocation): string {
  const parts: string[] = [];
  if (location.source) {
    parts.push(location.source);
  }
  if (typeof location.row === 'number') {
    if (typeof location.column === 'number') {
      parts.push(`${location.row}:${location.column}`);
    } else {
      parts.push(`${location.row}`);
    }
  }
  const locationPrefix = parts.length > 0 ? `${parts.join(':')} - ` : '';
  const decorated = `${locationPrefix}${description}`;
  if (location.lineText === undefined || typeof location.column !== 'number') {
    return decorated;
  }
  const lineText = location.lineText.replace(/\r?\n$/, '');
  return `${decorated}\n    ${lineText}\n    ${caretPadding(lineText, location.column)}^`;
}

// Tabs are kept so the caret lines up under tab-indented text.
function caretPadding(lineText: string, column: number): string {
  let padding = '';
  for (let i = 0; i < column - 1; i += 1) {
    padding += lineText[i] === '\t' ? '\t' : ' ';
  }
  return padding;
}
