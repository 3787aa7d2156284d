import { describe, it, expect, vi } from "vitest";
import { ConsoleProgressReporter } from "./progress.js";

describe("ConsoleProgressReporter", () => {
  it("spins on one line and clears it when done", () => {
    const write = vi.fn();
    const progress = new ConsoleProgressReporter({ write });

    progress.waiting(1, "created");
    progress.waiting(2, "created");
    progress.completed("Shipment confirmed");
    progress.notice("Label generated: 1001_label.pdf");

    expect(write.mock.calls.map((c) => c[0])).toEqual([
      "\rWaiting for shipment confirmation... |",
      "\rWaiting for shipment confirmation... /",
      `\r${" ".repeat(50)}\rShipment confirmed\n`,
      "Label generated: 1001_label.pdf\n",
    ]);
  });
});
