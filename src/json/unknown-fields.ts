import z from "zod";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const join = (path: readonly string[], key: string) => [...path, key];

/** Extra keys are allowed by z.looseObject or a catchall other than z.never() */
function extraKeySchema(schema: z.ZodObject): unknown {
  const { catchall } = schema.def;
  return catchall === undefined || catchall instanceof z.ZodNever
    ? null
    : catchall;
}

function collectObject(
  schema: z.ZodObject,
  value: unknown,
  path: readonly string[]
): string[] {
  if (!isRecord(value)) {
    return [];
  }
  const shape: Record<string, unknown> = schema.shape;
  const catchall = extraKeySchema(schema);
  return Object.entries(value).flatMap(([key, child]) => {
    if (Object.hasOwn(shape, key)) {
      return collectUnknownFields(shape[key], child, join(path, key));
    }
    if (catchall === null) {
      return [join(path, key).join(".")];
    }
    return collectUnknownFields(catchall, child, join(path, key));
  });
}

/**
 * Unknown keys of a union come from the options the value satisfies.
 * When any of them describes every key, nothing is unknown.
 */
function collectUnion(
  options: readonly unknown[],
  value: unknown,
  path: readonly string[]
): string[] {
  let fewest: string[] | null = null;
  for (const option of options) {
    if (!(option instanceof z.ZodType) || !z.safeParse(option, value).success) {
      continue;
    }
    const unknown = collectUnknownFields(option, value, path);
    if (unknown.length === 0) {
      return [];
    }
    fewest ??= unknown;
  }
  return fewest ?? [];
}

/**
 * Walks a decoded value alongside its schema and returns the dotted path of
 * every key the schema does not describe.
 */
export function collectUnknownFields(
  schema: unknown,
  value: unknown,
  path: readonly string[] = []
): string[] {
  if (
    schema instanceof z.ZodOptional ||
    schema instanceof z.ZodNullable ||
    schema instanceof z.ZodDefault ||
    schema instanceof z.ZodPrefault ||
    schema instanceof z.ZodNonOptional ||
    schema instanceof z.ZodCatch ||
    schema instanceof z.ZodReadonly
  ) {
    return collectUnknownFields(schema.def.innerType, value, path);
  }

  if (schema instanceof z.ZodLazy) {
    return collectUnknownFields(schema.def.getter(), value, path);
  }

  if (schema instanceof z.ZodPipe) {
    // z.preprocess: check the raw value against the output schema
    const source =
      schema.def.in instanceof z.ZodTransform ? schema.def.out : schema.def.in;
    return collectUnknownFields(source, value, path);
  }

  if (schema instanceof z.ZodObject) {
    return collectObject(schema, value, path);
  }

  if (schema instanceof z.ZodArray) {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.flatMap((item, index) =>
      collectUnknownFields(schema.element, item, join(path, String(index)))
    );
  }

  if (schema instanceof z.ZodTuple) {
    if (!Array.isArray(value)) {
      return [];
    }
    const { items, rest } = schema.def;
    return value.flatMap((item, index) =>
      collectUnknownFields(items[index] ?? rest, item, join(path, String(index)))
    );
  }

  if (schema instanceof z.ZodRecord) {
    if (!isRecord(value)) {
      return [];
    }
    const { valueType } = schema.def;
    return Object.entries(value).flatMap(([key, child]) =>
      collectUnknownFields(valueType, child, join(path, key))
    );
  }

  if (schema instanceof z.ZodIntersection) {
    // A key is known when either side describes it
    const right = new Set(collectUnknownFields(schema.def.right, value, path));
    return collectUnknownFields(schema.def.left, value, path).filter((field) =>
      right.has(field)
    );
  }

  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
    return collectUnion(schema.def.options, value, path);
  }

  return [];
}

/** First key the schema does not describe, or null when there is none */
export function findUnknownField(schema: unknown, value: unknown): string | null {
  return collectUnknownFields(schema, value)[0] ?? null;
}
