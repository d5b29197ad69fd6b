import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validated instance of `cls`, or null when the payload does not have its shape. */
export function parsePayload<T extends object>(cls: ClassConstructor<T>, value: unknown): T | null {
  if (!isPlainObject(value)) return null;
  const instance = plainToInstance(cls, value);
  return validateSync(instance).length ? null : instance;
}

/** Items of `list` that validate as `cls`; the rest are dropped. */
export function parseEach<T extends object>(cls: ClassConstructor<T>, list: unknown): T[] {
  if (!Array.isArray(list)) return [];
  const out: T[] = [];
  for (const item of list) {
    const parsed = parsePayload(cls, item);
    if (parsed) out.push(parsed);
  }
  return out;
}
