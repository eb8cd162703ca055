import type { DebugProtocol } from 'dap-session-client';
import { FormattedVariable } from './types';

const NODE_TYPES: ReadonlySet<string> = new Set([
  'Node',
  'Node2D',
  'Node3D',
  'Control',
  'CanvasItem',
  'Spatial',
  'Sprite2D',
  'Sprite3D',
  'CharacterBody2D',
  'CharacterBody3D',
  'RigidBody2D',
  'RigidBody3D',
  'StaticBody2D',
  'StaticBody3D',
  'Area2D',
  'Area3D',
  'Camera2D',
  'Camera3D',
  'Label',
  'Button',
  'Panel',
  'CollisionShape2D',
  'CollisionShape3D',
]);

const RECT2_PATTERN =
  /\[P:\s*\(([^,]+),\s*([^)]+)\),\s*S:\s*\(([^,]+),\s*([^)]+)\)\]/;
const AABB_PATTERN =
  /\[P:\s*\(([^,]+),\s*([^,]+),\s*([^)]+)\),\s*S:\s*\(([^,]+),\s*([^,]+),\s*([^)]+)\)\]/;
const TRANSFORM2D_PATTERN =
  /\[X:\s*\(([^)]+)\),\s*Y:\s*\(([^)]+)\),\s*O:\s*\(([^)]+)\)\]/;
const INSTANCE_PATTERN = /<([^#]+)#(\d+)>/;

/** `"(1, 2)"` with `count` 2 gives `["1", "2"]`; any other shape gives undefined. */
export function parseParenthesizedValues(
  value: string,
  count: number,
): string[] | undefined {
  const trimmed = value.trim();
  if (!trimmed.startsWith('(') || !trimmed.endsWith(')')) {
    return undefined;
  }
  const parts = trimmed.slice(1, -1).split(',');
  if (parts.length !== count) {
    return undefined;
  }
  return parts.map((part) => part.trim());
}

function captures(pattern: RegExp, value: string, count: number): string[] | undefined {
  const match = pattern.exec(value);
  if (!match || match.length !== count + 1) {
    return undefined;
  }
  return match.slice(1).map((group) => group.trim());
}

function formatLabelled(
  name: string,
  labels: readonly string[],
  value: string,
): string | undefined {
  const parts = parseParenthesizedValues(value, labels.length);
  if (!parts) {
    return undefined;
  }
  const fields = labels.map((label, i) => `${label}=${parts[i]}`);
  return `${name}(${fields.join(', ')})`;
}

function formatRect2(value: string): string | undefined {
  const m = captures(RECT2_PATTERN, value, 4);
  return m && `Rect2(pos=(${m[0]}, ${m[1]}), size=(${m[2]}, ${m[3]}))`;
}

function formatAABB(value: string): string | undefined {
  const m = captures(AABB_PATTERN, value, 6);
  return (
    m &&
    `AABB(pos=(${m[0]}, ${m[1]}, ${m[2]}), size=(${m[3]}, ${m[4]}, ${m[5]}))`
  );
}

function formatPlane(value: string): string | undefined {
  const parts = parseParenthesizedValues(value, 4);
  return (
    parts && `Plane(normal=(${parts[0]}, ${parts[1]}, ${parts[2]}), d=${parts[3]})`
  );
}

function formatTransform2D(value: string): string | undefined {
  const m = captures(TRANSFORM2D_PATTERN, value, 3);
  return m && `Transform2D(x=${m[0]}, y=${m[1]}, origin=${m[2]})`;
}

function formatArray(value: string): string | undefined {
  if (!value.startsWith('[') || !value.endsWith(']')) {
    return undefined;
  }
  const content = value.slice(1, -1).trim();
  if (content === '') {
    return 'Array(empty)';
  }
  // Splits nested values too; the count is a hint, not a parse.
  const elements = content.split(',').map((element) => element.trim());
  if (elements.length <= 3) {
    return `Array(${elements.length}): ${value}`;
  }
  return `Array(${elements.length}): [${elements.slice(0, 3).join(', ')}, ...]`;
}

function formatDictionary(value: string): string | undefined {
  if (!value.startsWith('{') || !value.endsWith('}')) {
    return undefined;
  }
  const content = value.slice(1, -1).trim();
  if (content === '') {
    return 'Dictionary(empty)';
  }
  const keyCount = content.split(':').length - 1;
  if (keyCount === 0) {
    return 'Dictionary(...)';
  }
  if (content.length <= 50) {
    return `Dictionary(${keyCount}): ${value}`;
  }
  return `Dictionary(${keyCount} keys)`;
}

export function isNodeType(typeName: string): boolean {
  return (
    NODE_TYPES.has(typeName) ||
    ['Node', 'Body', 'Area', 'Control'].some((fragment) =>
      typeName.includes(fragment),
    )
  );
}

function formatNode(typeName: string, value: string): string {
  if (value === '<null>' || value === 'null') {
    return `${typeName}(null)`;
  }
  const match = INSTANCE_PATTERN.exec(value);
  if (match) {
    return `${match[1]} (ID:${match[2]})`;
  }
  return `${typeName}: ${value}`;
}

/**
 * Readable form of an engine value, keyed by its DAP `type`. Returns
 * undefined for types without a special form or values in an unexpected shape.
 */
export function formatGodotValue(
  typeName: string,
  value: string,
): string | undefined {
  switch (typeName) {
    case 'Vector2':
    case 'Vector2i':
      return formatLabelled('Vector2', ['x', 'y'], value);
    case 'Vector3':
    case 'Vector3i':
      return formatLabelled('Vector3', ['x', 'y', 'z'], value);
    case 'Vector4':
    case 'Vector4i':
      return formatLabelled('Vector4', ['x', 'y', 'z', 'w'], value);
    case 'Color':
      return formatLabelled('Color', ['r', 'g', 'b', 'a'], value);
    case 'Quaternion':
      return formatLabelled('Quat', ['x', 'y', 'z', 'w'], value);
    case 'Rect2':
    case 'Rect2i':
      return formatRect2(value);
    case 'AABB':
      return formatAABB(value);
    case 'Plane':
      return formatPlane(value);
    case 'Transform2D':
      return formatTransform2D(value);
    case 'Transform3D':
      return value.includes('[X:') && value.includes('[O:')
        ? 'Transform3D(...)'
        : undefined;
    case 'Basis':
      return value.includes('[X:') && value.includes('Y:') && value.includes('Z:')
        ? 'Basis(...)'
        : undefined;
    case 'Array':
      return formatArray(value);
    case 'Dictionary':
      return formatDictionary(value);
    default:
      return isNodeType(typeName) ? formatNode(typeName, value) : undefined;
  }
}

export function formatVariable(
  variable: DebugProtocol.Variable,
): FormattedVariable {
  const type = variable.type ?? '';
  const result: FormattedVariable = {
    name: variable.name,
    value: variable.value,
    type,
  };
  const formatted = formatGodotValue(type, variable.value);
  if (formatted !== undefined) {
    result.formatted = formatted;
  }
  if (variable.variablesReference > 0) {
    result.expandable = true;
    result.variables_reference = variable.variablesReference;
  }
  if (variable.evaluateName) {
    result.evaluate_name = variable.evaluateName;
  }
  return result;
}

export function formatVariableList(
  variables: DebugProtocol.Variable[],
): FormattedVariable[] {
  return variables.map(formatVariable);
}
