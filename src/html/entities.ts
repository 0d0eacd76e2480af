import entityTable from "./data/htmlEntities.json";

const namedEntities: ReadonlyMap<string, number> = new Map(Object.entries(entityTable));

export function lookupEntity(name: string): number | undefined {
  return namedEntities.get(name);
}

export function entityCount(): number {
  return namedEntities.size;
}
