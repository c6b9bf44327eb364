export type EntityName = `${string}_${number}`;

export function entityName(base: string, index: number): EntityName {
  if (!Number.isInteger(index) || index < 0) throw new Error(`invalid entity index: ${index}`);
  return `${base}_${index}`;
}
