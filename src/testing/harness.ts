/**
 * Minimal test harness shared by the *.test.ts scripts.
 *
 * Each test file registers cases with test(), then calls run() at the end.
 * Cases run sequentially (async cases are awaited) and the process exits
 * with code 1 if any case failed.
 *
 * Run a file with: node --import tsx src/<area>/<name>.test.ts
 */

type TestFn = () => void | Promise<void>;

interface Entry {
  kind: "test" | "section";
  name: string;
  fn?: TestFn;
}

const entries: Entry[] = [];

export function section(title: string): void {
  entries.push({ kind: "section", name: title });
}

export function test(name: string, fn: TestFn): void {
  entries.push({ kind: "test", name, fn });
}

export async function run(suite: string): Promise<void> {
  let passed = 0;
  let failed = 0;

  console.log(`\n=== ${suite} ===`);

  for (const entry of entries) {
    if (entry.kind === "section" || entry.fn === undefined) {
      console.log(`\n── ${entry.name} ──`);
      continue;
    }
    try {
      await entry.fn();
      passed++;
      console.log(`  ✓ ${entry.name}`);
    } catch (err) {
      failed++;
      console.error(`  ✗ ${entry.name}`);
      console.error(`    ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  console.log(`\n═══════════════════════════════════════════════`);
  console.log(`  Results: ${passed} passed, ${failed} failed`);
  console.log(`═══════════════════════════════════════════════\n`);

  if (failed > 0) {
    process.exit(1);
  }
}

/**
 * Await a promise that must reject, returning the rejection value.
 */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected promise to reject");
}

/**
 * Call a function that must throw, returning the thrown value.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
