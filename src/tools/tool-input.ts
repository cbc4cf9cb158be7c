export type ToolArguments = Record<string, unknown>;

export function optionalString(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`Argument "${key}" must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function requiredString(args: ToolArguments, key: string): string {
  const value = optionalString(args, key);
  if (value === undefined) {
    throw new Error(`Missing required argument "${key}"`);
  }
  return value;
}
