/**
 * Fills `{name}` slots from `values`. Slots without a value are left as written.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match,
  );
}

function arrayShape(value: unknown[]): number[] {
  const shape: number[] = [];
  let level: unknown = value;
  while (Array.isArray(level)) {
    shape.push(level.length);
    level = level[0];
  }
  return shape;
}

function elementCount(view: ArrayBufferView): number {
  const length: unknown = Reflect.get(view, 'length');
  return typeof length === 'number' ? length : view.byteLength;
}

function declaredShape(value: object): number[] | undefined {
  const shape: unknown = Reflect.get(value, 'shape');
  if (Array.isArray(shape) && shape.every((dim) => typeof dim === 'number')) {
    return shape;
  }
  return undefined;
}

/**
 * One-line description of an observation for inclusion in a prompt.
 * Strings pass through; arrays, typed arrays and objects exposing a numeric
 * `shape` are summarised by their shape; anything else is JSON encoded.
 */
export function formatStateInfo(state: unknown): string {
  if (typeof state === 'string') return state;

  if (Array.isArray(state)) {
    return `Observation shape: [${arrayShape(state).join(', ')}]`;
  }

  if (ArrayBuffer.isView(state) && !(state instanceof DataView)) {
    return `Observation shape: [${elementCount(state)}]`;
  }

  if (typeof state === 'object' && state !== null) {
    const shape = declaredShape(state);
    if (shape) return `Observation shape: [${shape.join(', ')}]`;
  }

  try {
    const encoded = JSON.stringify(state);
    return encoded ?? String(state);
  } catch {
    // Circular structures and BigInts cannot be encoded.
    return String(state);
  }
}

export function buildSubgoalPrompt(template: string, goal: string, currentState?: unknown): string {
  let prompt = renderTemplate(template, { goal });
  if (currentState !== undefined && currentState !== null) {
    prompt += `\n\nCurrent state: ${formatStateInfo(currentState)}`;
  }
  return prompt;
}

export function buildTaskAnalysisPrompt(template: string, task: string): string {
  return renderTemplate(template, { task });
}
