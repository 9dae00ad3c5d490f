import { describe, expect, it } from "vitest";
import type { CategoryNode } from "../types";
import { sectionFor } from "./category-menu";

const menu: CategoryNode[] = [
  {
    slug: "kosmetika-i-gigiena",
    title: "Косметика и гигиена",
    children: [
      { slug: "ukhod-za-litsom", title: "Уход за лицом", children: [] },
    ],
  },
  { slug: "igrushki", title: "Игрушки", children: [] },
];

describe("sectionFor", () => {
  it("should return the titles along a nested slug", () => {
    expect(sectionFor(menu, "kosmetika-i-gigiena/ukhod-za-litsom")).toEqual({
      titles: ["Косметика и гигиена", "Уход за лицом"],
      unresolved: [],
    });
    expect(sectionFor(menu, "igrushki").titles).toEqual(["Игрушки"]);
  });

  it("should skip unknown segments and keep the titles it resolved", () => {
    expect(sectionFor(menu, "igrushki/lego")).toEqual({
      titles: ["Игрушки"],
      unresolved: ["lego"],
    });
    expect(sectionFor(menu, "sale/kosmetika-i-gigiena/ukhod-za-litsom")).toEqual({
      titles: ["Косметика и гигиена", "Уход за лицом"],
      unresolved: ["sale"],
    });
  });

  it("should resolve nothing for slugs outside the menu", () => {
    expect(sectionFor(menu, "unknown")).toEqual({
      titles: [],
      unresolved: ["unknown"],
    });
    expect(sectionFor(menu, "/")).toEqual({ titles: [], unresolved: [] });
    expect(sectionFor([], "igrushki").titles).toEqual([]);
  });
});
