import type { CrmRecord, ResourceType } from "../types";
import {
  parseAssociatedIds,
  parseObjectsPage,
  parsePropertyNames
} from "./responseParser";
import type { TransportClient } from "./transportClient";

export interface CrmClient {
  listProperties: (resourceType: ResourceType) => Promise<string[]>;
  fetchObjectsPage: (
    resourceType: ResourceType,
    properties: readonly string[],
    cursor: string | null,
    pageSize: number
  ) => Promise<CrmRecord[]>;
  fetchAssociations: (
    resourceType: ResourceType,
    objectId: string,
    toType: ResourceType
  ) => Promise<string[]>;
}

export function createCrmClient(transport: TransportClient): CrmClient {
  return {
    async listProperties(resourceType: ResourceType): Promise<string[]> {
      const payload = await transport.request(
        "GET",
        `/crm/v3/properties/${resourceType}`
      );
      return parsePropertyNames(payload);
    },

    async fetchObjectsPage(
      resourceType: ResourceType,
      properties: readonly string[],
      cursor: string | null,
      pageSize: number
    ): Promise<CrmRecord[]> {
      const payload = await transport.request(
        "GET",
        `/crm/v3/objects/${resourceType}`,
        {
          properties: properties.join(","),
          limit: pageSize,
          after: cursor
        }
      );
      return parseObjectsPage(payload);
    },

    async fetchAssociations(
      resourceType: ResourceType,
      objectId: string,
      toType: ResourceType
    ): Promise<string[]> {
      const payload = await transport.request(
        "GET",
        `/crm/v4/objects/${resourceType}/${encodeURIComponent(objectId)}/associations/${toType}`
      );
      return parseAssociatedIds(payload);
    }
  };
}
