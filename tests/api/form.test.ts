import { describe, it, expect } from "vitest";
import { appendQuery, encodeForm, idSegment, setIndexed, setOptional } from "../../src/api/form.js";
import type { FormPayload } from "../../src/api/types.js";

describe("setOptional", () => {
  it("skips undefined and keeps falsy values", () => {
    const data: FormPayload = {};
    setOptional(data, "a", undefined);
    setOptional(data, "b", "");
    setOptional(data, "c", 0);
    setOptional(data, "d", false);

    expect(data).toEqual({ b: "", c: 0, d: false });
    expect("a" in data).toBe(false);
  });
});

describe("setIndexed", () => {
  it("expands a list into indexed field names", () => {
    const data: FormPayload = {};
    setIndexed(data, "module[prerequisite_module_ids]", ["10", "20", "30"]);

    expect(data).toEqual({
      "module[prerequisite_module_ids][0]": "10",
      "module[prerequisite_module_ids][1]": "20",
      "module[prerequisite_module_ids][2]": "30",
    });
  });

  it("writes the empty-list sentinel for an empty list", () => {
    const data: FormPayload = {};
    setIndexed(data, "module[prerequisite_module_ids]", []);
    expect(data).toEqual({ "module[prerequisite_module_ids][]": "" });
  });

  it("writes nothing when the list is not provided", () => {
    const data: FormPayload = {};
    setIndexed(data, "module[prerequisite_module_ids]", undefined);
    expect(data).toEqual({});
  });
});

describe("encodeForm", () => {
  it("stringifies scalars", () => {
    const form = encodeForm({ "module[name]": "Week 1", "module[position]": 0, "module[publish_final_grade]": false });
    expect(form.toString()).toBe("module%5Bname%5D=Week+1&module%5Bposition%5D=0&module%5Bpublish_final_grade%5D=false");
  });
});

describe("appendQuery", () => {
  it("skips undefined values and repeats list values", () => {
    const url = new URL("https://canvas.test/api/v1/courses");
    appendQuery(url, { enrollment_type: "teacher", state: undefined, "include[]": ["term", "total_students"] });

    expect(url.searchParams.get("enrollment_type")).toBe("teacher");
    expect(url.searchParams.has("state")).toBe(false);
    expect(url.searchParams.getAll("include[]")).toEqual(["term", "total_students"]);
  });
});

describe("idSegment", () => {
  it("encodes identifiers as one path segment", () => {
    expect(idSegment(123)).toBe("123");
    expect(idSegment("sis_course_id:A/B")).toBe("sis_course_id%3AA%2FB");
  });
});
