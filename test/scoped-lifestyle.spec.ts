import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setTimeout } from "node:timers/promises";
import {
  DiContainer,
  IContainer,
  IOnDispose,
  Lifestyles,
  Scope,
  ScopeDisposedError,
  ScopeResolutionError,
  ScopedLifestyle,
  createHybrid,
} from "../src";

class ManualScopedLifestyle extends ScopedLifestyle {
  public scope: Scope | undefined;

  public constructor() {
    super("Manual Scoped");
  }

  public getCurrentScope(): Scope | undefined {
    return this.scope;
  }
}

describe("ScopedLifestyle", () => {
  const SCOPED_TOKEN = "SCOPED_TOKEN";

  const createContainer = (onCreate: () => void) =>
    new DiContainer().registerFactory(
      SCOPED_TOKEN,
      async () => {
        onCreate();
        await setTimeout(1);
        return { name: "scoped-service" };
      },
      { lifestyle: Lifestyles.scoped }
    );

  it("should throw when resolving outside of a scope", async () => {
    let created = 0;
    const container = createContainer(() => created++);

    await assert.rejects(container.resolve(SCOPED_TOKEN), (err: unknown) => {
      assert.ok(err instanceof ScopeResolutionError);
      assert.equal(
        err.message,
        "Cannot resolve Async Scoped service for token 'SCOPED_TOKEN' outside of an active scope. Wrap the call in runWithNewScope()."
      );
      return true;
    });
    assert.equal(created, 0);
  });

  it("should build once per scope", async () => {
    let created = 0;
    const container = createContainer(() => created++);

    const first = await container.runWithNewScope(async (c) => {
      const [a, b, c2] = await Promise.all([
        c.resolve(SCOPED_TOKEN),
        c.resolve(SCOPED_TOKEN),
        c.resolve(SCOPED_TOKEN),
      ]);
      assert.strictEqual(a, b);
      assert.strictEqual(b, c2);
      assert.strictEqual(await c.resolve(SCOPED_TOKEN), a);
      return a;
    });

    const second = await container.runWithNewScope((c) =>
      c.resolve(SCOPED_TOKEN)
    );

    assert.equal(created, 2);
    assert.notStrictEqual(first, second);
  });

  it("should give a nested scope its own instances", async () => {
    let created = 0;
    const container = createContainer(() => created++);

    await container.runWithNewScope(async (c) => {
      const outer = await c.resolve(SCOPED_TOKEN);
      const inner = await c.runWithNewScope((nested) =>
        nested.resolve(SCOPED_TOKEN)
      );

      assert.notStrictEqual(inner, outer);
      assert.strictEqual(await c.resolve(SCOPED_TOKEN), outer);
    });

    assert.equal(created, 2);
  });

  it("should not see the scope of another container", async () => {
    const container = createContainer(() => undefined);
    const other = new DiContainer();

    await other.runWithNewScope(async () => {
      assert.equal(other.isInScope(), true);
      assert.equal(container.isInScope(), false);
      await assert.rejects(container.resolve(SCOPED_TOKEN), ScopeResolutionError);
    });
  });

  it("should dispose scoped instances when the scope ends", async () => {
    let disposed = 0;
    const container = new DiContainer().registerFactory(
      "connection",
      (): IOnDispose => ({
        onDispose() {
          disposed++;
        },
      }),
      { lifestyle: Lifestyles.scoped }
    );

    await container.runWithNewScope(async (c) => {
      await c.resolve("connection");
      await c.resolve("connection");
      assert.equal(disposed, 0);
    });

    assert.equal(disposed, 1);
  });

  it("should skip disposal for registrations that suppress it", async () => {
    let disposed = 0;
    const container = new DiContainer().registerFactory(
      "connection",
      (): IOnDispose => ({
        onDispose() {
          disposed++;
        },
      }),
      { lifestyle: Lifestyles.scoped, suppressDisposal: true }
    );

    await container.runWithNewScope((c) => c.resolve("connection"));

    assert.equal(disposed, 0);
  });

  it("should dispose the scope even when the callback throws", async () => {
    let disposed = 0;
    const container = new DiContainer().registerFactory(
      "connection",
      (): IOnDispose => ({
        onDispose() {
          disposed++;
        },
      }),
      { lifestyle: Lifestyles.scoped }
    );

    await assert.rejects(
      container.runWithNewScope(async (c) => {
        await c.resolve("connection");
        throw new Error("request failed");
      }),
      /request failed/
    );

    assert.equal(disposed, 1);
  });

  it("should refuse to build in a scope that has been disposed", async () => {
    const container = createContainer(() => undefined);

    const { late } = await container.runWithNewScope(() => ({
      late: (async () => {
        await setTimeout(20);
        return container.resolve(SCOPED_TOKEN);
      })(),
    }));

    await assert.rejects(late, ScopeDisposedError);
  });

  it("should dispose an instance that finishes building after its scope ended", async () => {
    let built = 0;
    let disposed = 0;
    const container = new DiContainer().registerFactory(
      "connection",
      async (): Promise<IOnDispose> => {
        await setTimeout(20);
        built++;
        return {
          onDispose() {
            disposed++;
          },
        };
      },
      { lifestyle: Lifestyles.scoped }
    );

    const { pending } = await container.runWithNewScope(async (c) => {
      const pending = c.resolve("connection");
      await setTimeout(1);
      return { pending };
    });
    assert.equal(disposed, 0);

    await pending;

    assert.equal(built, 1);
    assert.equal(disposed, 1);
  });

  it("should return the value of the scope callback", async () => {
    const container = new DiContainer();

    const result = await container.runWithNewScope(() => "scope-result");

    assert.equal(result, "scope-result");
  });

  describe("hybrids", () => {
    it("should use the scope inside one and the singleton outside", async () => {
      let created = 0;
      const container = new DiContainer();
      container.registerFactory("S", () => ({ id: ++created }), {
        lifestyle: createHybrid(
          () => container.isInScope(),
          Lifestyles.scoped,
          Lifestyles.singleton
        ),
      });

      const outside = await container.resolveRequired("S");
      assert.strictEqual(await container.resolveRequired("S"), outside);

      const [first, second] = await container.runWithNewScope(async (c) => [
        await c.resolveRequired("S"),
        await c.resolveRequired("S"),
      ]);

      assert.strictEqual(first, second);
      assert.notStrictEqual(first, outside);
      assert.equal(created, 2);
    });

    it("should ask the selected lifestyle for the current scope", async () => {
      let useManual = true;
      const manual = new ManualScopedLifestyle();
      const hybrid = createHybrid(() => useManual, manual, Lifestyles.scoped);
      const container = new DiContainer();
      const manualScope = new Scope(container);
      manual.scope = manualScope;

      await container.runWithNewScope(async () => {
        const asyncScope = Lifestyles.scoped.getCurrentScope(container);
        assert.ok(asyncScope);

        assert.strictEqual(hybrid.getCurrentScope(container), manualScope);
        useManual = false;
        assert.strictEqual(hybrid.getCurrentScope(container), asyncScope);
      });
    });

    it("should cache per scope of whichever lifestyle is selected", async () => {
      let useManual = true;
      let created = 0;
      const manual = new ManualScopedLifestyle();
      const container: IContainer = new DiContainer();
      const manualScope = new Scope(container);
      manual.scope = manualScope;
      const producer = createHybrid(
        () => useManual,
        manual,
        Lifestyles.scoped
      ).createProducer("S", () => ({ id: ++created }), container);

      const fromManual = await producer.getInstance();
      assert.strictEqual(await producer.getInstance(), fromManual);

      useManual = false;
      await assert.rejects(producer.getInstance(), ScopeResolutionError);

      await manualScope.dispose();
      useManual = true;
      await assert.rejects(producer.getInstance(), ScopeDisposedError);
      assert.equal(created, 1);
    });
  });
});
