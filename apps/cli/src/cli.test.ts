import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";
import { runCli, type CliIo } from "./cli.js";

const deliveryConfig = {
  grid: { width: 3, height: 3, cell_size: 50 },
  nodes: [
    { id: "distribution_center", grid_x: 1, grid_y: 1, type: "distribution_center" },
    { id: "a", grid_x: 0, grid_y: 0 },
    { id: "b", grid_x: 2, grid_y: 2 }
  ],
  delivery_addresses: ["a", "b"]
};

type LogLine = { level: number; msg: string; code?: string };

function createIo(files: Record<string, string>) {
  const logs: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        logs.push(JSON.parse(line));
      }
    }
  );
  const io = {
    readFile: vi.fn(async (path: string) => {
      const contents = files[path];
      if (contents === undefined) {
        throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), {
          code: "ENOENT"
        });
      }
      return contents;
    }),
    writeFile: vi.fn(async (_path: string, _contents: string) => {}),
    print: vi.fn((_text: string) => {}),
    logger
  } satisfies CliIo;
  return { io, logs };
}

describe("runCli", () => {
  it("prints usage for --help", async () => {
    const { io } = createIo({});

    expect(await runCli(["--help"], io)).toBe(0);
    expect(io.print.mock.calls[0][0]).toMatch(/^Usage: gridroute/);
    expect(io.readFile).not.toHaveBeenCalled();
  });

  it("writes the map and prints a summary", async () => {
    const { io } = createIo({ "config.json": JSON.stringify(deliveryConfig) });

    expect(await runCli([], io)).toBe(0);

    const [path, html] = io.writeFile.mock.calls[0];
    expect(path).toBe("output.html");
    expect(html.startsWith("<!DOCTYPE html>")).toBe(true);

    const summary = io.print.mock.calls[0][0];
    expect(summary.split("\n")).toContain("Route: distribution_center → a → b");
    expect(summary.split("\n")).toContain("Algorithm: TSP Nearest Neighbor");
    expect(summary.split("\n")).toContain("Output file: output.html");
  });

  it("lets --strategy override the config file", async () => {
    const { io } = createIo({ "routes.json": JSON.stringify(deliveryConfig) });

    expect(await runCli(["routes.json", "--strategy", "2opt", "--output", "map.html"], io)).toBe(0);
    expect(io.writeFile.mock.calls[0][0]).toBe("map.html");
    const lines = io.print.mock.calls[0][0].split("\n");
    expect(lines).toContain("Algorithm: TSP + 2-Opt Local Search");
    expect(lines).toContain("Iterations performed: 1");
  });

  it("warns and stops when there is nothing to deliver", async () => {
    const { io, logs } = createIo({
      "config.json": JSON.stringify({ ...deliveryConfig, delivery_addresses: [] })
    });

    expect(await runCli([], io)).toBe(0);
    expect(io.writeFile).not.toHaveBeenCalled();
    expect(logs).toContainEqual(
      expect.objectContaining({
        level: 40,
        msg: "no delivery addresses configured, nothing to optimize"
      })
    );
  });

  it("fails on a missing config file", async () => {
    const { io, logs } = createIo({});

    expect(await runCli(["missing.json"], io)).toBe(1);
    expect(logs).toContainEqual(
      expect.objectContaining({ level: 50, msg: "config file 'missing.json' not found" })
    );
  });

  it("fails on malformed JSON", async () => {
    const { io, logs } = createIo({ "config.json": "{ nodes: " });

    expect(await runCli([], io)).toBe(1);
    expect(logs[logs.length - 1].msg).toMatch(/^Config file 'config.json' is not valid JSON: /);
  });

  it("fails on an unknown strategy", async () => {
    const { io, logs } = createIo({ "config.json": JSON.stringify(deliveryConfig) });

    expect(await runCli(["--strategy", "genetic"], io)).toBe(1);
    expect(logs[logs.length - 1]).toMatchObject({
      level: 50,
      code: "UNKNOWN_STRATEGY",
      msg: "Unknown strategy 'genetic'. Available: nearest_neighbor, 2opt."
    });
    expect(io.writeFile).not.toHaveBeenCalled();
  });
});
