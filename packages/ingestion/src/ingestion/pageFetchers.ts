import type { CrmClient } from "../api/crmClient";
import { storedIdentifier } from "../db/schema";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { CrmRecord, ResourceType } from "../types";

export const DEFAULT_PAGE_SIZE = 100;

export type PageFetcher = (cursor: string | null) => Promise<CrmRecord[]>;

export type PageFetchers = Record<ResourceType, PageFetcher>;

export type PropertiesByType = Record<ResourceType, readonly string[]>;

export function createPageFetchers(
  client: CrmClient,
  propertiesByType: PropertiesByType,
  pageSize: number = DEFAULT_PAGE_SIZE
): PageFetchers {
  const build = (resourceType: ResourceType): PageFetcher => {
    const properties = propertiesByType[resourceType];
    return (cursor) =>
      client.fetchObjectsPage(resourceType, properties, cursor, pageSize);
  };

  return {
    companies: build("companies"),
    contacts: build("contacts"),
    notes: build("notes"),
    tasks: build("tasks"),
    calls: build("calls")
  };
}

/**
 * Drops repeated names, the `id` column and names that would collide with an
 * earlier column once PostgreSQL truncates them.
 */
export function usableProperties(
  resourceType: ResourceType,
  names: readonly string[],
  logger: Logger = silentLogger
): string[] {
  const columns = new Map<string, string>([["id", "id"]]);
  const kept: string[] = [];

  for (const name of names) {
    const column = storedIdentifier(name);
    const owner = columns.get(column);

    if (owner === undefined) {
      columns.set(column, name);
      kept.push(name);
      continue;
    }

    if (owner !== name) {
      logger.warn("property collides with another column after truncation, dropping", {
        resource: resourceType,
        property: name,
        column,
        keptProperty: owner
      });
    }
  }

  return kept;
}

// Property discovery runs once per run so every page of a resource type
// requests the same column set.
export async function discoverProperties(
  client: CrmClient,
  logger: Logger = silentLogger
): Promise<PropertiesByType> {
  const discover = async (resourceType: ResourceType): Promise<string[]> =>
    usableProperties(resourceType, await client.listProperties(resourceType), logger);

  return {
    companies: await discover("companies"),
    contacts: await discover("contacts"),
    notes: await discover("notes"),
    tasks: await discover("tasks"),
    calls: await discover("calls")
  };
}

// The last id of a page is the resume token for the next request. Callers
// must treat it as opaque.
export function nextCursorFromPage(records: readonly CrmRecord[]): string | null {
  if (records.length === 0) {
    return null;
  }

  return records[records.length - 1].id;
}
