import { describe, expect, it } from "vitest";
import { blankImage, fillRect } from "@/lib/capture/testing";
import { detectActionButtons } from "./buttons";
import { analyzePlayerStatus } from "./player-status";

describe("detectActionButtons", () => {
  const area = { x: 0, y: 0, width: 200, height: 100 };

  it("maps visible button colors to actions", () => {
    const image = blankImage(200, 100, [15, 40, 20]);
    fillRect(image, { x: 10, y: 10, width: 30, height: 20 }, [220, 30, 30]);
    fillRect(image, { x: 60, y: 10, width: 30, height: 20 }, [40, 200, 60]);

    expect(detectActionButtons(image, area)).toEqual(["fold", "check"]);
  });

  it("includes raise for a yellow button and ignores small colored marks", () => {
    const image = blankImage(200, 100, [15, 40, 20]);
    fillRect(image, { x: 10, y: 10, width: 40, height: 20 }, [230, 200, 20]);
    fillRect(image, { x: 100, y: 10, width: 10, height: 10 }, [220, 30, 30]);

    expect(detectActionButtons(image, area)).toEqual(["raise"]);
  });

  it("finds nothing on bare felt", () => {
    expect(detectActionButtons(blankImage(200, 100, [15, 40, 20]), area)).toEqual([]);
  });
});

describe("analyzePlayerStatus", () => {
  const seat = { x: 0, y: 0, width: 100, height: 60 };

  it("treats a dark seat as inactive", () => {
    const status = analyzePlayerStatus(blankImage(100, 60, [10, 10, 10]), seat);
    expect(status.isActive).toBe(false);
    expect(status.isCurrent).toBe(false);
  });

  it("flags a lit seat with a gold border as active and current", () => {
    const image = blankImage(100, 60, [120, 120, 120]);
    fillRect(image, { x: 0, y: 0, width: 100, height: 3 }, [230, 200, 20]);

    const status = analyzePlayerStatus(image, seat);
    expect(status.isActive).toBe(true);
    expect(status.isCurrent).toBe(true);
    expect(status.highlightShare).toBe(0.05);
  });
});
