import type { ResourceType } from "../types";

export const RESOURCE_TYPES: readonly ResourceType[] = [
  "companies",
  "contacts",
  "notes",
  "tasks",
  "calls"
];

export const ASSOCIATION_PARTNERS: Readonly<Record<ResourceType, readonly ResourceType[]>> = {
  companies: ["contacts"],
  contacts: [],
  notes: ["companies", "contacts"],
  tasks: ["companies", "contacts"],
  calls: ["companies", "contacts"]
};

export const ASSOCIATIONS_TABLE = "associations";

export function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((resourceType) => resourceType === value);
}

export function associationResourceTypes(): ResourceType[] {
  return RESOURCE_TYPES.filter(
    (resourceType) => ASSOCIATION_PARTNERS[resourceType].length > 0
  );
}
