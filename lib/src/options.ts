export function requireOption(
  name: string,
  value: string | undefined = process.env[name]
): string {
  if (!value) {
    throw new Error(`Option ${name} is not provided.`);
  }
  return value;
}

export function numberOption(
  name: string,
  fallback: number,
  value: string | undefined = process.env[name]
): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option ${name} must be a positive number, got "${value}".`);
  }
  return parsed;
}

export function choiceOption<T extends string>(
  name: string,
  choices: readonly T[],
  fallback: T,
  value: string | undefined = process.env[name]
): T {
  if (!value) {
    return fallback;
  }
  const choice = choices.find((candidate) => candidate === value);
  if (choice === undefined) {
    throw new Error(
      `Option ${name} must be one of ${choices.join(", ")}, got "${value}".`
    );
  }
  return choice;
}
