/**
 * Tooltip Placement Tests
 */

import { describe, expect, it } from "vitest";
import { computeTooltipPosition } from "../tooltipPosition";

const window = { width: 300, height: 600 };
const popup = { width: 100, height: 40 };

describe("computeTooltipPosition", () => {
  it("places the tooltip below a top-left anchor and aligns its start", () => {
    expect(computeTooltipPosition({ x: 10, y: 10, width: 50, height: 20 }, window, popup)).toEqual({ x: 10, y: 34 });
  });

  it("places the tooltip above a bottom-right anchor and aligns its end", () => {
    expect(computeTooltipPosition({ x: 250, y: 560, width: 40, height: 20 }, window, popup)).toEqual({
      x: 190,
      y: 516,
    });
  });

  it("centers under an anchor in the middle third", () => {
    expect(computeTooltipPosition({ x: 130, y: 100, width: 40, height: 20 }, window, popup)).toEqual({
      x: 100,
      y: 124,
    });
  });

  it("flips TOP below when there is no room above", () => {
    const anchor = { x: 100, y: 10, width: 40, height: 20 };

    expect(computeTooltipPosition(anchor, window, popup, { position: "TOP", alignment: "START" })).toEqual({
      x: 100,
      y: 34,
    });
  });

  it("flips BOTTOM above when there is no room below", () => {
    const anchor = { x: 100, y: 570, width: 40, height: 20 };

    expect(computeTooltipPosition(anchor, window, popup, { position: "BOTTOM", alignment: "START" })).toEqual({
      x: 100,
      y: 526,
    });
  });

  it("clamps into the window", () => {
    const anchor = { x: 0, y: 100, width: 20, height: 20 };

    expect(computeTooltipPosition(anchor, window, popup, { alignment: "CENTER", spacing: 10 })).toEqual({
      x: 0,
      y: 130,
    });
  });
});
