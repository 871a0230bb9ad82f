import { latLonToPosition } from "./globe-math";

describe("latLonToPosition", () => {
  it("returns (1, 0, 0) at 0°N 0°E on a unit sphere", () => {
    const [x, y, z] = latLonToPosition(0, 0, 1);
    expect(x).toBeCloseTo(1, 10);
    expect(y).toBeCloseTo(0, 10);
    expect(z).toBeCloseTo(0, 10);
  });

  it("returns (0, 1, 0) at 90°N on a unit sphere", () => {
    const [x, y, z] = latLonToPosition(90, 0, 1);
    expect(x).toBeCloseTo(0, 10);
    expect(y).toBeCloseTo(1, 10);
    expect(z).toBeCloseTo(0, 10);
  });

  it("returns (0, 0, -r) at 0°N 90°E", () => {
    const [x, y, z] = latLonToPosition(0, 90, 2);
    expect(x).toBeCloseTo(0, 10);
    expect(y).toBeCloseTo(0, 10);
    expect(z).toBeCloseTo(-2, 10);
  });
});
