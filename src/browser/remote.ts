// ── DevTools remote values ───────────────────────────────────
// Console-API arguments arrive as `Runtime.RemoteObject`s. Primitives carry
// `value`; objects only carry a shallow `preview`, rebuilt here into plain data.

export interface PropertyPreview {
  name: string;
  type: string;
  value?: string;
  subtype?: string;
  valuePreview?: ObjectPreview;
}

export interface ObjectPreview {
  subtype?: string;
  description?: string;
  overflow: boolean;
  properties: PropertyPreview[];
}

export interface RemoteValue {
  type?: string;
  subtype?: string;
  value?: unknown;
  unserializableValue?: string;
  description?: string;
  preview?: ObjectPreview;
}

export function remoteValue(arg: RemoteValue): unknown {
  if ('value' in arg) return arg.value;
  if (arg.preview) return previewValue(arg.preview);
  return arg.unserializableValue ?? arg.description ?? null;
}

export function previewValue(preview: ObjectPreview): unknown {
  if (preview.subtype === 'array') {
    return preview.properties
      .filter((property) => /^\d+$/.test(property.name))
      .map((property) => propertyValue(property));
  }

  const result: Record<string, unknown> = {};
  for (const property of preview.properties) {
    result[property.name] = propertyValue(property);
  }
  return result;
}

function propertyValue(property: PropertyPreview): unknown {
  if (property.valuePreview) return previewValue(property.valuePreview);

  switch (property.type) {
    case 'number': {
      const parsed = Number(property.value);
      return Number.isNaN(parsed) ? (property.value ?? null) : parsed;
    }
    case 'boolean':
      return property.value === 'true';
    case 'undefined':
      return null;
    case 'object':
      return property.subtype === 'null' ? null : (property.value ?? null);
    default:
      return property.value ?? null;
  }
}
