import { describe, it, expect, vi } from "vitest";
import { CanvasApiClient } from "../../src/api/client.js";
import {
  addPageToModule,
  createPage,
  createPageAndAddToModule,
  deletePage,
  getPage,
  listPages,
  pageSlugFromUrl,
  updatePage,
} from "../../src/api/pages.js";
import { captureApiError, formFields, jsonResponse, stubFetch } from "../helpers/fetch-stub.js";

const client = new CanvasApiClient({ baseUrl: "https://canvas.test/api/v1", token: "test-token" });

describe("page operations", () => {
  it("listPages only sends search_term when given", async () => {
    const { requests } = stubFetch(jsonResponse([]), jsonResponse([]));

    await listPages(client, { courseId: 10 });
    await listPages(client, { courseId: 10, searchTerm: "" });

    expect(requests[0]?.url.search).toBe("");
    expect(requests[1]?.url.searchParams.get("search_term")).toBe("");
  });

  it("createPage sends title, body and provided flags", async () => {
    const { requests } = stubFetch(jsonResponse({ url: "intro" }));

    await createPage(client, { courseId: 10, title: "Intro", body: "<p>Hi</p>", published: false });

    expect(requests[0]?.method).toBe("POST");
    expect(requests[0]?.url.pathname).toBe("/api/v1/courses/10/pages");
    expect(formFields(requests[0])).toEqual({
      "wiki_page[title]": "Intro",
      "wiki_page[body]": "<p>Hi</p>",
      "wiki_page[published]": "false",
    });
  });

  it("updatePage, getPage and deletePage address the page by slug", async () => {
    const { requests } = stubFetch(jsonResponse({}), jsonResponse({}), jsonResponse({}));

    await updatePage(client, { courseId: 10, pageUrl: "intro", frontPage: true, editingRoles: "teachers" });
    await getPage(client, 10, "intro");
    await deletePage(client, 10, "intro");

    expect(requests.map((r) => `${r.method} ${r.url.pathname}`)).toEqual([
      "PUT /api/v1/courses/10/pages/intro",
      "GET /api/v1/courses/10/pages/intro",
      "DELETE /api/v1/courses/10/pages/intro",
    ]);
    expect(formFields(requests[0])).toEqual({
      "wiki_page[editing_roles]": "teachers",
      "wiki_page[front_page]": "true",
    });
  });
});

describe("pageSlugFromUrl", () => {
  it("takes the final path segment", () => {
    expect(pageSlugFromUrl("https://canvas.test/courses/10/pages/intro")).toBe("intro");
    expect(pageSlugFromUrl("intro")).toBe("intro");
    expect(pageSlugFromUrl("https://canvas.test/courses/10/pages/intro/")).toBe("intro");
    expect(pageSlugFromUrl("")).toBe("");
  });
});

describe("addPageToModule", () => {
  it("fetches the page, then creates a Page item with its id and title", async () => {
    const { requests } = stubFetch(
      jsonResponse({ page_id: 501, url: "week-1", title: "Week 1 Overview" }),
      jsonResponse({ id: 900, type: "Page" }),
    );

    const item = await addPageToModule(client, { courseId: 10, moduleId: 4, pageUrl: "week-1", indent: 1 });

    expect(item).toEqual({ id: 900, type: "Page" });
    expect(requests.map((r) => `${r.method} ${r.url.pathname}`)).toEqual([
      "GET /api/v1/courses/10/pages/week-1",
      "POST /api/v1/courses/10/modules/4/items",
    ]);
    expect(formFields(requests[1])).toEqual({
      "module_item[title]": "Week 1 Overview",
      "module_item[type]": "Page",
      "module_item[content_id]": "501",
      "module_item[indent]": "1",
      "module_item[page_url]": "week-1",
    });
  });

  it("prefers the supplied title", async () => {
    const { requests } = stubFetch(
      jsonResponse({ page_id: 501, title: "Week 1 Overview" }),
      jsonResponse({ id: 900 }),
    );

    await addPageToModule(client, { courseId: 10, moduleId: 4, pageUrl: "week-1", title: "Start here" });

    expect(formFields(requests[1])["module_item[title]"]).toBe("Start here");
  });

  it("stops after a failed page lookup", async () => {
    const { requests } = stubFetch(jsonResponse({ message: "page not found" }, 404));

    const error = await captureApiError(addPageToModule(client, { courseId: 10, moduleId: 4, pageUrl: "gone" }));

    expect(error.statusCode).toBe(404);
    expect(error.message).toBe("page not found");
    expect(requests).toHaveLength(1);
  });
});

describe("createPageAndAddToModule", () => {
  it("creates a published page and links it by the last segment of its url", async () => {
    const { requests } = stubFetch(
      jsonResponse({ page_id: 601, url: "https://canvas.test/courses/10/pages/intro", title: "Intro" }),
      jsonResponse({ id: 901, type: "Page", page_url: "intro" }),
    );

    const item = await createPageAndAddToModule(client, {
      courseId: 10,
      moduleId: 4,
      title: "Intro",
      body: "<p>Welcome</p>",
      modulePosition: 1,
    });

    expect(item).toEqual({ id: 901, type: "Page", page_url: "intro" });
    expect(requests).toHaveLength(2);
    expect(requests[0]?.url.pathname).toBe("/api/v1/courses/10/pages");
    expect(formFields(requests[0])).toEqual({
      "wiki_page[title]": "Intro",
      "wiki_page[body]": "<p>Welcome</p>",
      "wiki_page[published]": "true",
    });
    expect(requests[1]?.url.pathname).toBe("/api/v1/courses/10/modules/4/items");
    expect(formFields(requests[1])).toEqual({
      "module_item[title]": "Intro",
      "module_item[type]": "Page",
      "module_item[content_id]": "601",
      "module_item[position]": "1",
      "module_item[page_url]": "intro",
    });
  });

  it("leaves the page in place and rethrows when the module item fails", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {});
    const { requests } = stubFetch(
      jsonResponse({ page_id: 602, url: "orphan" }),
      jsonResponse({ errors: [{ message: "module not found" }] }, 404),
    );

    const error = await captureApiError(
      createPageAndAddToModule(client, { courseId: 10, moduleId: 999, title: "Orphan", body: "" }),
    );

    expect(error.statusCode).toBe(404);
    expect(error.message).toBe("module not found");
    expect(requests.map((r) => r.method)).toEqual(["POST", "POST"]);
    expect(errorLog).toHaveBeenCalledWith(
      expect.stringContaining('[WARN] Page "orphan" was created in course 10 but not added to module 999'),
    );
  });

  it("does not create a module item when the page cannot be created", async () => {
    const { requests } = stubFetch(jsonResponse({ errors: { message: "Unauthorized" } }, 401));

    const error = await captureApiError(
      createPageAndAddToModule(client, { courseId: 10, moduleId: 4, title: "X", body: "" }),
    );

    expect(error.toJSON()).toEqual({ statusCode: 401, message: "Unauthorized" });
    expect(requests).toHaveLength(1);
  });
});
