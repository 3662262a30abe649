import { describe, expect, it, vi } from "vitest";

import { createCrmClient } from "../src/api/crmClient";
import type { HttpMethod, QueryParams } from "../src/api/transportClient";

function transportReturning(payload: unknown) {
  return {
    request: vi.fn(
      async (_method: HttpMethod, _path: string, _params?: QueryParams): Promise<unknown> =>
        payload
    )
  };
}

describe("createCrmClient", () => {
  it("lists property names for a resource type", async () => {
    const transport = transportReturning({ results: [{ name: "name" }, { name: "domain" }] });
    const client = createCrmClient(transport);

    await expect(client.listProperties("companies")).resolves.toEqual(["name", "domain"]);
    expect(transport.request).toHaveBeenCalledWith("GET", "/crm/v3/properties/companies");
  });

  it("requests an objects page with properties, limit and cursor", async () => {
    const transport = transportReturning({
      results: [{ id: "5", properties: { firstname: "Ada" } }]
    });
    const client = createCrmClient(transport);

    const records = await client.fetchObjectsPage("contacts", ["firstname", "email"], "4", 100);

    expect(records).toEqual([{ id: "5", properties: { firstname: "Ada" } }]);
    expect(transport.request).toHaveBeenCalledWith("GET", "/crm/v3/objects/contacts", {
      properties: "firstname,email",
      limit: 100,
      after: "4"
    });
  });

  it("fetches associated ids for one object", async () => {
    const transport = transportReturning({ results: [{ toObjectId: 301 }] });
    const client = createCrmClient(transport);

    await expect(client.fetchAssociations("notes", "a/b", "companies")).resolves.toEqual([
      "301"
    ]);
    expect(transport.request).toHaveBeenCalledWith(
      "GET",
      "/crm/v4/objects/notes/a%2Fb/associations/companies"
    );
  });
});
