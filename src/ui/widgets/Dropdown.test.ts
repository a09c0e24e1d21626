import { describe, it, expect } from "vitest";
import { cell } from "../Cell";
import { RecordingBackend } from "../RecordingBackend";
import { createFixedWidthMeasurer } from "../TextMeasurer";
import { UIContext } from "../UIContext";
import { Dropdown } from "./Dropdown";

const measurer = createFixedWidthMeasurer({ charWidth: 10, lineHeight: 20 });

function fruits(selected: string | null = null): Dropdown<string> {
  return new Dropdown({ items: ["Apple", "Banana", "Cherry"], selected: cell(selected), measurer });
}

describe("Dropdown sizing", () => {
  it("keeps the minimum width for short items", () => {
    const dropdown = fruits();
    expect(dropdown.width).toBe(150);
    expect(dropdown.height).toBe(30);
  });

  it("widens to the longest item", () => {
    const dropdown = new Dropdown({ items: ["a fairly long option", "b"], selected: cell<string | null>(null), measurer });
    expect(dropdown.width).toBe(230);
  });

  it("resizes when items change", () => {
    const dropdown = fruits();
    expect(dropdown.width).toBe(150);
    dropdown.items = ["an even longer option!"];
    expect(dropdown.width).toBe(250);
  });
});

describe("Dropdown selection", () => {
  it("selects the first and last items", () => {
    const dropdown = fruits();
    dropdown.selectFirst();
    expect(dropdown.selected.get()).toBe("Apple");
    dropdown.selectLast();
    expect(dropdown.selected.get()).toBe("Cherry");
    expect(dropdown.selectedIndex).toBe(2);
  });

  it("selects by index and ignores out-of-range indices", () => {
    const dropdown = fruits("Apple");
    dropdown.selectByIndex(1);
    expect(dropdown.selected.get()).toBe("Banana");
    dropdown.selectByIndex(5);
    dropdown.selectByIndex(-1);
    expect(dropdown.selected.get()).toBe("Banana");
  });

  it("clears the selection", () => {
    const dropdown = fruits("Cherry");
    expect(dropdown.hasSelection).toBe(true);
    dropdown.clearSelection();
    expect(dropdown.hasSelection).toBe(false);
    expect(dropdown.selectedIndex).toBe(-1);
    expect(dropdown.selectedText).toBe("Select...");
  });

  it("drops a selection that is no longer listed", () => {
    const dropdown = fruits("Banana");
    dropdown.items = ["Apple", "Cherry"];
    expect(dropdown.selected.get()).toBeNull();
  });

  it("formats items for display", () => {
    const selected = cell<{ id: number; name: string } | null>(null);
    const items = [
      { id: 1, name: "Low" },
      { id: 2, name: "High" },
    ];
    const dropdown = new Dropdown({ items, selected, format: (item) => item.name });
    dropdown.selectByIndex(1);
    expect(dropdown.selectedText).toBe("High");
    expect(selected.get()).toBe(items[1]);
  });

  it("applies the item chosen from the menu", () => {
    const dropdown = fruits();
    const backend = new RecordingBackend({ selectMenu: () => 1 });

    new UIContext({ backend }).frame((ui) => dropdown.render(ui));

    expect(dropdown.selected.get()).toBe("Banana");
    expect(backend.commands).toEqual([
      {
        kind: "selectMenu",
        rect: { x: 0, y: 0, width: 150, height: 30 },
        label: "Select...",
        options: ["Apple", "Banana", "Cherry"],
      },
    ]);
  });
});
