import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command } from "commander";
import { v4 as uuid } from "uuid";
import { Journal } from "@waymark/journal";
import { MapStore, mapFilePath, type LoadResult } from "@waymark/mapper";
import { dim } from "@waymark/parser";
import {
  loadConfig,
  parsePositiveInt,
  parseServer,
  type ConfigOverrides,
  type LoadConfigOptions,
  type WaymarkConfig,
} from "./config.js";
import { formatJournalEvent, renderedMapLines } from "./formatter.js";
import { ConsoleSessionWriter, MapperSession, type SessionWriter } from "./session.js";
import { replayTranscript } from "./transcript.js";

/** Where settings come from; tests pin these instead of the real process. */
export type ProgramOptions = Omit<LoadConfigOptions, "overrides"> & { color?: boolean };

interface ServerOpts {
  server: string;
  mapDir?: string;
}

interface OpenedMap extends LoadResult {
  config: WaymarkConfig;
  store: MapStore;
}

/** Collects lines so they can be printed after something else. */
class LineBuffer implements SessionWriter {
  lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }
}

export function createProgram(options: ProgramOptions = {}): Command {
  const cwd = options.cwd ?? process.cwd();
  const color = options.color ?? process.stdout.isTTY === true;

  async function openMap(opts: ServerOpts, overrides: ConfigOverrides = {}): Promise<OpenedMap> {
    const config = await loadConfig({
      env: options.env,
      cwd,
      homeDir: options.homeDir,
      overrides: { ...overrides, ...(opts.mapDir ? { mapDir: resolve(cwd, opts.mapDir) } : {}) },
    });
    const { host, port } = parseServer(opts.server);
    const store = new MapStore(mapFilePath(config.mapDir, host, port));
    const { map, migrated } = await store.load();
    return { config, store, map, migrated };
  }

  function readOnlySession(opened: OpenedMap, writer: SessionWriter): MapperSession {
    return new MapperSession({
      map: opened.map,
      writer,
      nearbyRadius: opened.config.nearbyRadius,
      viewport: { width: opened.config.mapWidth, height: opened.config.mapHeight },
    });
  }

  const program = new Command();
  // Errors reach the caller as CommanderError instead of exiting the process
  program.name("waymark").description("World mapper for MUD sessions").version("0.1.0").exitOverride();

  const withServer = (cmd: Command): Command =>
    cmd
      .requiredOption("--server <host:port>", "Game server the map belongs to")
      .option("--map-dir <dir>", "Directory holding map files");

  withServer(program.command("replay").description("Map a recorded session transcript"))
    .argument("<transcript>", "Transcript file; lines starting with \"> \" are player commands")
    .option("--journal <path>", "Journal file for mapper events")
    .option("--debug", "Print parser traces and journal events")
    .action(async (transcript: string, opts: ServerOpts & { journal?: string; debug?: boolean }) => {
      const overrides: ConfigOverrides = {};
      if (opts.journal) overrides.journalPath = resolve(cwd, opts.journal);
      if (opts.debug) overrides.mapDebug = true;
      const opened = await openMap(opts, overrides);
      const { config, store, map, migrated } = opened;
      const content = await readFile(resolve(cwd, transcript), "utf-8");
      const writer = new ConsoleSessionWriter(color);

      const journal = new Journal(config.journalPath);
      await journal.init();
      const sessionId = uuid();
      const removeListener = config.mapDebug
        ? journal.on((event) => writer.write(formatJournalEvent(event)))
        : () => {};

      try {
        await journal.tryEmit(sessionId, "session.started", { server: opts.server, transcript });
        await journal.tryEmit(sessionId, "map.loaded", { path: store.getFilePath(), rooms: map.roomCount });
        if (migrated) {
          await journal.tryEmit(sessionId, "map.migrated", { path: store.getFilePath(), rooms: map.roomCount });
        }

        const session = new MapperSession({
          map,
          writer,
          journal,
          sessionId,
          nearbyRadius: config.nearbyRadius,
          viewport: { width: config.mapWidth, height: config.mapHeight },
          trace: config.mapDebug ? (message) => writer.write(dim(`[parser] ${message}`)) : undefined,
        });
        const commands = await replayTranscript(session, content);

        if (session.isDirty) {
          await store.save(map);
          session.markSaved();
          await journal.tryEmit(sessionId, "map.saved", { path: store.getFilePath(), rooms: map.roomCount });
        }
        console.log(`[waymark] Replayed ${commands} commands; ${map.roomCount} rooms in ${store.getFilePath()}`);
        for (const line of renderedMapLines(session.renderMap(color))) writer.write(line);
        await journal.tryEmit(sessionId, "session.ended", { rooms: map.roomCount });
      } finally {
        removeListener();
        await journal.close();
      }
    });

  withServer(program.command("map").description("Print the map around the current room"))
    .option("--width <n>", "Viewport width", (v: string) => parsePositiveInt(v, "width"))
    .option("--height <n>", "Viewport height", (v: string) => parsePositiveInt(v, "height"))
    .option("--legend", "Number the rooms on the map and list them")
    .action(async (opts: ServerOpts & { width?: number; height?: number; legend?: boolean }) => {
      const overrides: ConfigOverrides = {};
      if (opts.width !== undefined) overrides.mapWidth = opts.width;
      if (opts.height !== undefined) overrides.mapHeight = opts.height;
      const opened = await openMap(opts, overrides);
      const writer = new ConsoleSessionWriter(color);
      const legend = new LineBuffer();
      const session = readOnlySession(opened, legend);
      if (opts.legend) await session.handleCommand("/legend");
      for (const line of renderedMapLines(session.renderMap(color))) writer.write(line);
      for (const line of legend.lines) writer.write(line);
    });

  withServer(program.command("rooms").description("List known rooms by number"))
    .argument("[filter...]", "Search terms")
    .action(async (filter: string[], opts: ServerOpts) => {
      const session = readOnlySession(await openMap(opts), new ConsoleSessionWriter(color));
      await session.handleCommand(["/rooms", ...filter].join(" "));
    });

  withServer(program.command("path").description("Show the route from the current room to a room"))
    .argument("<query...>", "Search terms or a room number")
    .action(async (query: string[], opts: ServerOpts) => {
      const session = readOnlySession(await openMap(opts), new ConsoleSessionWriter(color));
      await session.handleCommand(["/wayfind", ...query].join(" "));
    });

  withServer(program.command("nearby").description("List rooms near the current room"))
    .option("--max <n>", "Maximum distance in steps", (v: string) => parsePositiveInt(v, "max"))
    .action(async (opts: ServerOpts & { max?: number }) => {
      const opened = await openMap(opts, opts.max !== undefined ? { nearbyRadius: opts.max } : {});
      const session = readOnlySession(opened, new ConsoleSessionWriter(color));
      await session.handleCommand("/nearby");
    });

  return program;
}
