import { createServer, type ServerResponse } from "node:http";

import {
  buildMockDataset,
  isMockObjectType,
  lookupAssociations,
  paginateObjects
} from "./mockData";

const port = Number.parseInt(process.env.PORT ?? "3100", 10);
const recordsPerType = Number.parseInt(process.env.MOCK_RECORDS_PER_TYPE ?? "250", 10);
const failureRate = Number.parseFloat(process.env.MOCK_FAILURE_RATE ?? "0");

const dataset = buildMockDataset({
  companies: recordsPerType,
  contacts: recordsPerType,
  notes: recordsPerType,
  tasks: recordsPerType,
  calls: recordsPerType
});

const PROPERTIES_PATH = /^\/crm\/v3\/properties\/([^/]+)$/;
const OBJECTS_PATH = /^\/crm\/v3\/objects\/([^/]+)$/;
const ASSOCIATIONS_PATH = /^\/crm\/v4\/objects\/([^/]+)\/([^/]+)\/associations\/([^/]+)$/;

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

const server = createServer((request, response) => {
  if (!request.url) {
    writeJson(response, 400, { error: "Missing URL" });
    return;
  }

  const url = new URL(request.url, `http://localhost:${port}`);

  if (url.pathname === "/health") {
    writeJson(response, 200, { status: "ok" });
    return;
  }

  if (failureRate > 0 && Math.random() < failureRate) {
    writeJson(response, 503, { error: "Service Unavailable" });
    return;
  }

  const propertiesType = PROPERTIES_PATH.exec(url.pathname)?.[1] ?? "";
  if (isMockObjectType(propertiesType)) {
    writeJson(response, 200, {
      results: dataset.properties[propertiesType].map((name) => ({ name }))
    });
    return;
  }

  const objectsType = OBJECTS_PATH.exec(url.pathname)?.[1] ?? "";
  if (isMockObjectType(objectsType)) {
    const limit = Number.parseInt(url.searchParams.get("limit") ?? "100", 10);
    const after = url.searchParams.get("after");
    const properties = url.searchParams.get("properties");

    writeJson(
      response,
      200,
      paginateObjects(
        dataset.objects[objectsType],
        Number.isNaN(limit) ? 100 : limit,
        after,
        properties ? properties.split(",") : null
      )
    );
    return;
  }

  const [, fromType = "", fromId = "", toType = ""] =
    ASSOCIATIONS_PATH.exec(url.pathname) ?? [];
  if (isMockObjectType(fromType) && isMockObjectType(toType)) {
    writeJson(
      response,
      200,
      lookupAssociations(dataset, fromType, decodeURIComponent(fromId), toType)
    );
    return;
  }

  writeJson(response, 404, { error: "Not Found" });
});

server.listen(port, "0.0.0.0", () => {
  console.log(
    `mock crm api listening on port ${port} with ${recordsPerType} records per type`
  );
});
