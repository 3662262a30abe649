import { describe, expect, it } from "vitest";

import {
  buildAddMissingColumnsSql,
  buildCreateResourceTableSql,
  ensureResourceTable,
  listTableColumns,
  storedIdentifier
} from "../src/db/schema";
import { createFakeClient } from "./helpers/fakes";

describe("buildCreateResourceTableSql", () => {
  it("creates one text column per property", () => {
    expect(buildCreateResourceTableSql("companies", ["name", "domain"])).toBe(
      'CREATE TABLE IF NOT EXISTS "companies" ("id" TEXT PRIMARY KEY, "name" TEXT, "domain" TEXT);'
    );
  });
});

describe("buildAddMissingColumnsSql", () => {
  it("adds columns that appeared since the table was created", () => {
    expect(buildAddMissingColumnsSql("calls", ["hs_call_duration"])).toBe(
      'ALTER TABLE "calls" ADD COLUMN IF NOT EXISTS "hs_call_duration" TEXT;'
    );
    expect(buildAddMissingColumnsSql("calls", [])).toBeNull();
  });
});

describe("ensureResourceTable", () => {
  it("creates the table and then adds missing columns", async () => {
    const client = createFakeClient();

    await ensureResourceTable(client, "tasks", ["subject"]);

    expect(client.query.mock.calls.map((call) => call[0])).toEqual([
      'CREATE TABLE IF NOT EXISTS "tasks" ("id" TEXT PRIMARY KEY, "subject" TEXT);',
      'ALTER TABLE "tasks" ADD COLUMN IF NOT EXISTS "subject" TEXT;'
    ]);
  });

  it("only creates the table when there are no properties", async () => {
    const client = createFakeClient();

    await ensureResourceTable(client, "notes", []);

    expect(client.query).toHaveBeenCalledOnce();
  });
});

describe("listTableColumns", () => {
  it("returns column names in table order", async () => {
    const client = createFakeClient(() => [{ column_name: "id" }, { column_name: "name" }]);

    await expect(listTableColumns(client, "contacts")).resolves.toEqual(["id", "name"]);
    expect(client.query).toHaveBeenCalledWith(expect.stringContaining("information_schema.columns"), [
      "contacts"
    ]);
  });
});

describe("storedIdentifier", () => {
  it("cuts long names to 63 bytes on a character boundary", () => {
    expect(storedIdentifier("hs_lastmodifieddate")).toBe("hs_lastmodifieddate");
    expect(storedIdentifier("a".repeat(70))).toBe("a".repeat(63));
    expect(storedIdentifier(`${"a".repeat(62)}é`)).toBe("a".repeat(62));
  });
});
