export type MockObjectType = "companies" | "contacts" | "notes" | "tasks" | "calls";

export const MOCK_OBJECT_TYPES: readonly MockObjectType[] = [
  "companies",
  "contacts",
  "notes",
  "tasks",
  "calls"
];

export interface MockObject {
  id: string;
  properties: Record<string, string | null>;
}

export interface MockDataset {
  properties: Record<MockObjectType, string[]>;
  objects: Record<MockObjectType, MockObject[]>;
  associations: Map<string, string[]>;
}

export const MOCK_PROPERTIES: Record<MockObjectType, string[]> = {
  companies: ["name", "domain", "industry", "createdate"],
  contacts: ["firstname", "lastname", "email", "createdate"],
  notes: ["hs_note_body", "hs_timestamp"],
  tasks: ["hs_task_subject", "hs_task_status", "hs_timestamp"],
  calls: ["hs_call_title", "hs_call_duration", "hs_timestamp"]
};

const BASE_TIMESTAMP_MS = Date.parse("2024-01-01T00:00:00.000Z");

function mockId(prefix: number, index: number): string {
  return `${prefix}${index.toString().padStart(6, "0")}`;
}

function buildProperties(
  type: MockObjectType,
  index: number
): Record<string, string | null> {
  const timestamp = new Date(BASE_TIMESTAMP_MS + index * 60_000).toISOString();

  switch (type) {
    case "companies":
      return {
        name: `Company ${index}`,
        domain: `company-${index}.example`,
        industry: index % 3 === 0 ? null : "SOFTWARE",
        createdate: timestamp
      };
    case "contacts":
      return {
        firstname: `First${index}`,
        lastname: `Last${index}`,
        email: `contact-${index}@example.test`,
        createdate: timestamp
      };
    case "notes":
      return { hs_note_body: `Note ${index}, follow up`, hs_timestamp: timestamp };
    case "tasks":
      return {
        hs_task_subject: `Task ${index}`,
        hs_task_status: index % 2 === 0 ? "COMPLETED" : "NOT_STARTED",
        hs_timestamp: timestamp
      };
    case "calls":
      return {
        hs_call_title: `Call ${index}`,
        hs_call_duration: String(index * 1000),
        hs_timestamp: timestamp
      };
  }
}

const ID_PREFIXES: Record<MockObjectType, number> = {
  companies: 1,
  contacts: 2,
  notes: 3,
  tasks: 4,
  calls: 5
};

export function associationKey(
  fromType: MockObjectType,
  fromId: string,
  toType: MockObjectType
): string {
  return `${fromType}:${fromId}:${toType}`;
}

export function buildMockDataset(
  counts: Record<MockObjectType, number>
): MockDataset {
  const objects: Record<MockObjectType, MockObject[]> = {
    companies: [],
    contacts: [],
    notes: [],
    tasks: [],
    calls: []
  };

  for (const type of MOCK_OBJECT_TYPES) {
    for (let index = 0; index < counts[type]; index += 1) {
      objects[type].push({
        id: mockId(ID_PREFIXES[type], index),
        properties: buildProperties(type, index)
      });
    }
  }

  const associations = new Map<string, string[]>();
  const companies = objects.companies;
  const contacts = objects.contacts;

  companies.forEach((company, index) => {
    const linked = contacts.filter(
      (_, contactIndex) => contactIndex % companies.length === index
    );
    associations.set(
      associationKey("companies", company.id, "contacts"),
      linked.map((contact) => contact.id)
    );
  });

  for (const type of ["notes", "tasks", "calls"] as const) {
    objects[type].forEach((activity, index) => {
      const company = companies.length > 0 ? companies[index % companies.length] : null;
      const contact = contacts.length > 0 ? contacts[index % contacts.length] : null;
      associations.set(
        associationKey(type, activity.id, "companies"),
        company ? [company.id] : []
      );
      associations.set(
        associationKey(type, activity.id, "contacts"),
        contact ? [contact.id] : []
      );
    });
  }

  return { properties: { ...MOCK_PROPERTIES }, objects, associations };
}

export interface MockObjectsPage {
  results: MockObject[];
}

/**
 * Objects are ordered by id and `after` is the last id the caller saw. Past
 * the end the page is empty.
 */
export function paginateObjects(
  objects: readonly MockObject[],
  limit: number,
  after: string | null,
  propertyNames: readonly string[] | null
): MockObjectsPage {
  const startIndex =
    after === null ? 0 : objects.findIndex((object) => object.id > after);
  const pageSize = Math.min(Math.max(limit, 1), 100);

  if (startIndex === -1) {
    return { results: [] };
  }

  const results = objects.slice(startIndex, startIndex + pageSize).map((object) => {
    if (propertyNames === null) {
      return object;
    }

    const properties: Record<string, string | null> = {};
    for (const name of propertyNames) {
      if (name in object.properties) {
        properties[name] = object.properties[name];
      }
    }

    return { id: object.id, properties };
  });

  return { results };
}

export function lookupAssociations(
  dataset: MockDataset,
  fromType: MockObjectType,
  fromId: string,
  toType: MockObjectType
): { results: Array<{ toObjectId: string }> } {
  const ids = dataset.associations.get(associationKey(fromType, fromId, toType)) ?? [];
  return { results: ids.map((toObjectId) => ({ toObjectId })) };
}

export function isMockObjectType(value: string): value is MockObjectType {
  return MOCK_OBJECT_TYPES.some((type) => type === value);
}
