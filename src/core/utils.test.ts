import { describe, expect, it } from "vitest";

import { arnToName, parseTaskDefinitionName } from "./utils.js";

describe("arnToName", () => {
  it("returns the last path segment of an ARN", () => {
    expect(arnToName("arn:aws:ecs:us-east-1:123456789012:task-definition/app:3")).toBe("app:3");
    expect(arnToName("arn:aws:ecs:us-east-1:123456789012:task/default/0123abcd")).toBe(
      "0123abcd",
    );
  });

  it("returns plain names unchanged", () => {
    expect(arnToName("app:3")).toBe("app:3");
  });
});

describe("parseTaskDefinitionName", () => {
  it("splits family and revision", () => {
    expect(
      parseTaskDefinitionName("arn:aws:ecs:us-east-1:123456789012:task-definition/app:12"),
    ).toEqual({ family: "app", revision: 12 });
  });

  it("omits the revision when there is none", () => {
    expect(parseTaskDefinitionName("app")).toEqual({ family: "app" });
  });
});
