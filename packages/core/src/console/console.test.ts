/**
 * Console Algebra Tests
 */
import { describe, it, expect, vi } from "vitest";
import { Console, parseInteger } from "./console.js";
import { runConsole } from "./interpreter.js";
import { TestTerminal, type Terminal } from "./terminal.js";

/**
 * Terminal that records reads and writes in one interleaved event log
 */
function recordingTerminal(input: string[]): Terminal & { events: string[] } {
  const events: string[] = [];
  return {
    events,
    readLine() {
      const line = input.shift();
      if (line === undefined) throw new Error("no input");
      events.push(`read:${line}`);
      return line;
    },
    writeLine(line) {
      events.push(`write:${line}`);
    },
  };
}

const ask = (question: string): Console<string> =>
  Console.zipRight(Console.writeLine(question), Console.readLine);

describe("Console", () => {
  // ============================================================================
  // Constructors
  // ============================================================================

  describe("constructors", () => {
    it("writeLine should describe a write followed by a unit result", () => {
      const p = Console.writeLine("hi");
      expect(p._tag).toBe("WriteLine");
      if (p._tag !== "WriteLine") return;
      expect(p.line).toBe("hi");
      expect(p.next._tag).toBe("Done");
    });

    it("readLine should hand the line read to a Done node", () => {
      const p = Console.readLine;
      expect(p._tag).toBe("ReadLine");
      if (p._tag !== "ReadLine") return;
      const next = p.next("typed");
      expect(next._tag).toBe("Done");
      if (next._tag !== "Done") return;
      expect(next.value()).toBe("typed");
    });

    it("succeed should produce its value", () => {
      expect(runConsole(Console.succeed(42), new TestTerminal())).toBe(42);
    });

    it("sync should run its producer once per run, never at construction", () => {
      let forced = 0;
      const p = Console.sync(() => {
        forced += 1;
        return forced;
      });

      expect(forced).toBe(0);
      expect(runConsole(p, new TestTerminal())).toBe(1);
      expect(runConsole(p, new TestTerminal())).toBe(2);
    });

    it("unit should produce undefined", () => {
      expect(runConsole(Console.unit, new TestTerminal())).toBe(undefined);
    });
  });

  // ============================================================================
  // Inertness
  // ============================================================================

  describe("construction", () => {
    it("should perform no I/O until interpreted", () => {
      const terminal = { readLine: vi.fn(() => "x"), writeLine: vi.fn() };

      const program = Console.zip(
        Console.collectAll([ask("a"), ask("b")]),
        Console.foreach(["c", "d"], (q) => Console.zipLeft(ask(q), Console.writeLine("ok"))),
      );

      expect(terminal.readLine).not.toHaveBeenCalled();
      expect(terminal.writeLine).not.toHaveBeenCalled();

      runConsole(program, terminal);
      expect(terminal.readLine).toHaveBeenCalledTimes(4);
      expect(terminal.writeLine).toHaveBeenCalledTimes(6);
    });

    it("should not force a Done that waits behind a read", () => {
      let forced = false;
      const p = Console.flatMap(Console.readLine, (line) =>
        Console.sync(() => {
          forced = true;
          return line.length;
        }),
      );

      expect(forced).toBe(false);
      expect(runConsole(p, new TestTerminal(["four"]))).toBe(4);
      expect(forced).toBe(true);
    });
  });

  // ============================================================================
  // Sequencing
  // ============================================================================

  describe("flatMap", () => {
    it("should push the continuation past pending writes", () => {
      const p = Console.flatMap(Console.writeLine("a"), () => Console.writeLine("b"));

      expect(p._tag).toBe("WriteLine");
      if (p._tag !== "WriteLine") return;
      expect(p.line).toBe("a");
      expect(p.next._tag).toBe("WriteLine");
      if (p.next._tag !== "WriteLine") return;
      expect(p.next.line).toBe("b");
      expect(p.next.next._tag).toBe("Done");
    });

    it("should push the continuation past a pending read", () => {
      const p = Console.flatMap(Console.readLine, (name) => Console.writeLine(`hi ${name}`));
      expect(p._tag).toBe("ReadLine");

      const terminal = new TestTerminal(["Bo"]);
      runConsole(p, terminal);
      expect(terminal.output).toEqual(["hi Bo"]);
    });

    it("should build long write chains without recursion", () => {
      let chain: Console<void> = Console.unit;
      for (let i = 0; i < 100_000; i++) {
        chain = Console.WriteLine(`line ${i}`, chain);
      }

      const p = Console.flatMap(chain, () => Console.succeed("done"));
      const terminal = new TestTerminal();
      expect(runConsole(p, terminal)).toBe("done");
      expect(terminal.output.length).toBe(100_000);
      expect(terminal.output[0]).toBe("line 99999");
      expect(terminal.output[99_999]).toBe("line 0");
    });
  });

  describe("map", () => {
    it("should transform the result", () => {
      const p = Console.map(Console.readLine, (s) => s.toUpperCase());
      expect(runConsole(p, new TestTerminal(["shout"]))).toBe("SHOUT");
    });

    it("as and void_ should replace the result", () => {
      expect(runConsole(Console.as(Console.readLine, 1), new TestTerminal(["x"]))).toBe(1);
      expect(runConsole(Console.void_(Console.readLine), new TestTerminal(["x"]))).toBe(undefined);
    });

    it("flatten should run the inner program", () => {
      const nested = Console.map(Console.readLine, (s) => Console.writeLine(`got ${s}`));
      const terminal = new TestTerminal(["it"]);
      runConsole(Console.flatten(nested), terminal);
      expect(terminal.output).toEqual(["got it"]);
    });
  });

  describe("zip", () => {
    it("should run the left program strictly before the right one", () => {
      const terminal = recordingTerminal(["x", "y"]);
      const result = runConsole(Console.zip(ask("one"), ask("two")), terminal);

      expect(result).toEqual(["x", "y"]);
      expect(terminal.events).toEqual(["write:one", "read:x", "write:two", "read:y"]);
    });

    it("zipRight should keep the second result, zipLeft the first", () => {
      const right = runConsole(Console.zipRight(ask("q1"), ask("q2")), new TestTerminal(["a", "b"]));
      const left = runConsole(Console.zipLeft(ask("q1"), ask("q2")), new TestTerminal(["a", "b"]));

      expect(right).toBe("b");
      expect(left).toBe("a");
    });

    it("zipLeft should still run the right program's effects after the left", () => {
      const terminal = recordingTerminal(["a"]);
      runConsole(Console.zipLeft(ask("first"), Console.writeLine("second")), terminal);
      expect(terminal.events).toEqual(["write:first", "read:a", "write:second"]);
    });
  });

  // ============================================================================
  // Lists
  // ============================================================================

  describe("collectAll", () => {
    it("should return an empty list for no programs", () => {
      const terminal = new TestTerminal();
      expect(runConsole(Console.collectAll([]), terminal)).toEqual([]);
      expect(terminal.output).toEqual([]);
    });

    it("should preserve input order", () => {
      const terminal = recordingTerminal(["1", "2", "3"]);
      const result = runConsole(Console.collectAll(["a", "b", "c"].map(ask)), terminal);

      expect(result).toEqual(["1", "2", "3"]);
      expect(terminal.events).toEqual([
        "write:a",
        "read:1",
        "write:b",
        "read:2",
        "write:c",
        "read:3",
      ]);
    });

    it("should give fresh result arrays on every run", () => {
      const program = Console.collectAll([Console.succeed(1), Console.succeed(2)]);
      const first = runConsole(program, new TestTerminal());
      first.push(3);
      expect(runConsole(program, new TestTerminal())).toEqual([1, 2]);
    });

    it("should handle 100,000 pure and write-only programs", () => {
      const programs = Array.from({ length: 100_000 }, (_, i) =>
        i % 2 === 0 ? Console.succeed(i) : Console.as(Console.writeLine(`#${i}`), i),
      );
      const terminal = new TestTerminal();
      const result = runConsole(Console.collectAll(programs), terminal);

      expect(result.length).toBe(100_000);
      expect(result[99_999]).toBe(99_999);
      expect(terminal.output.length).toBe(50_000);
      expect(terminal.output[0]).toBe("#1");
    });
  });

  describe("foreach", () => {
    it("should apply the body to each value in order", () => {
      const terminal = new TestTerminal(["red", "green", "blue"]);
      const result = runConsole(Console.foreach(["a", "b", "c"], ask), terminal);

      expect(terminal.output).toEqual(["a", "b", "c"]);
      expect(result).toEqual(["red", "green", "blue"]);
    });

    it("should match collectAll over the mapped values", () => {
      const viaForeach = runConsole(
        Console.foreach([1, 2], (n) => Console.as(Console.writeLine(`#${n}`), n * 2)),
        new TestTerminal(),
      );
      const viaCollectAll = runConsole(
        Console.collectAll([1, 2].map((n) => Console.as(Console.writeLine(`#${n}`), n * 2))),
        new TestTerminal(),
      );
      expect(viaForeach).toEqual([2, 4]);
      expect(viaCollectAll).toEqual(viaForeach);
    });

    it("should ask and read 100,000 times without overflowing the stack", () => {
      const questions = Array.from({ length: 100_000 }, (_, i) => `q${i}`);
      const replies = questions.map((_, i) => `r${i}`);
      const terminal = new TestTerminal(replies);

      const result = runConsole(Console.foreach(questions, ask), terminal);

      expect(result.length).toBe(100_000);
      expect(result[0]).toBe("r0");
      expect(result[99_999]).toBe("r99999");
      expect(terminal.output[99_999]).toBe("q99999");
      expect(terminal.remainingInput).toEqual([]);
    });
  });

  // ============================================================================
  // Parse Guards
  // ============================================================================

  describe("readInt", () => {
    it("should read a present integer", () => {
      expect(runConsole(Console.readInt, new TestTerminal(["42"]))).toBe(42);
    });

    it("should yield None for text that is not an integer", () => {
      expect(runConsole(Console.readInt, new TestTerminal(["oops"]))).toBe(null);
    });

    it("readAs should use the given parser", () => {
      const yes = Console.readAs((s) => (s === "y" ? true : null));
      expect(runConsole(yes, new TestTerminal(["y"]))).toBe(true);
      expect(runConsole(yes, new TestTerminal(["n"]))).toBe(null);
    });
  });

  describe("parseInteger", () => {
    it("should accept an optional sign followed by digits", () => {
      expect(parseInteger("7")).toBe(7);
      expect(parseInteger("-7")).toBe(-7);
      expect(parseInteger("+7")).toBe(7);
    });

    it("should reject anything else", () => {
      expect(parseInteger("")).toBe(null);
      expect(parseInteger(" 42")).toBe(null);
      expect(parseInteger("4x")).toBe(null);
      expect(parseInteger("1.5")).toBe(null);
      expect(parseInteger("99999999999999999999")).toBe(null);
    });
  });
});
