import { describe, it, expect } from "vitest";
import { CanvasApiClient } from "../../src/api/client.js";
import {
  createModule,
  deleteModule,
  getModule,
  listModules,
  updateModule,
} from "../../src/api/modules.js";
import { formFields, jsonResponse, stubFetch } from "../helpers/fetch-stub.js";

const client = new CanvasApiClient({ baseUrl: "https://canvas.test/api/v1", token: "test-token" });

describe("module operations", () => {
  it("createModule with only a name sends only the name", async () => {
    const { requests } = stubFetch(jsonResponse({ id: 3, name: "Week 1" }));

    const created = await createModule(client, { courseId: 10, name: "Week 1" });

    expect(created).toEqual({ id: 3, name: "Week 1" });
    expect(requests[0]?.method).toBe("POST");
    expect(requests[0]?.url.pathname).toBe("/api/v1/courses/10/modules");
    expect(formFields(requests[0])).toEqual({ "module[name]": "Week 1" });
  });

  it("createModule keeps falsy values and indexes prerequisites", async () => {
    const { requests } = stubFetch(jsonResponse({ id: 4 }));

    await createModule(client, {
      courseId: 10,
      name: "Week 2",
      position: 0,
      unlockAt: "2026-01-12T08:00:00Z",
      requireSequentialProgress: false,
      prerequisiteModuleIds: ["3", 5],
      publishFinalGrade: false,
    });

    const fields = formFields(requests[0]);
    expect(fields).toEqual({
      "module[name]": "Week 2",
      "module[position]": "0",
      "module[unlock_at]": "2026-01-12T08:00:00Z",
      "module[require_sequential_progress]": "false",
      "module[prerequisite_module_ids][0]": "3",
      "module[prerequisite_module_ids][1]": "5",
      "module[publish_final_grade]": "false",
    });
    expect("module[prerequisite_module_ids]" in fields).toBe(false);
  });

  it("updateModule clears prerequisites with the empty-list sentinel", async () => {
    const { requests } = stubFetch(jsonResponse({ id: 4 }));

    await updateModule(client, { courseId: 10, moduleId: 4, prerequisiteModuleIds: [] });

    expect(requests[0]?.method).toBe("PUT");
    expect(requests[0]?.url.pathname).toBe("/api/v1/courses/10/modules/4");
    expect(formFields(requests[0])).toEqual({ "module[prerequisite_module_ids][]": "" });
  });

  it("updateModule leaves out everything not provided", async () => {
    const { requests } = stubFetch(jsonResponse({ id: 4 }));

    await updateModule(client, { courseId: 10, moduleId: 4, name: "Renamed" });

    expect(formFields(requests[0])).toEqual({ "module[name]": "Renamed" });
  });

  it("read and delete operations use the module paths", async () => {
    const { requests } = stubFetch(jsonResponse([]), jsonResponse({ id: 4 }), jsonResponse({ id: 4 }));

    await listModules(client, 10);
    await getModule(client, 10, 4);
    await deleteModule(client, 10, 4);

    expect(requests.map((r) => `${r.method} ${r.url.pathname}`)).toEqual([
      "GET /api/v1/courses/10/modules",
      "GET /api/v1/courses/10/modules/4",
      "DELETE /api/v1/courses/10/modules/4",
    ]);
  });
});
