import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setImmediate } from "node:timers/promises";
import {
  DiContainer,
  CyclicDependencyError,
  InstanceProducer,
  Lifestyles,
  ResolutionChain,
} from "../src";

describe("CycleGuard", () => {
  class Service {}
  class Dependency {}

  describe("enter / exit", () => {
    it("should start idle and release its storage when the last construction exits", () => {
      const registration = Lifestyles.transient.createRegistration(
        Service,
        () => new Service(),
        new DiContainer()
      );
      const guard = registration.cycleGuard;
      assert.equal(guard.isIdle, true);

      const first = guard.enter(undefined);
      const second = guard.enter(undefined);
      assert.equal(guard.isIdle, false);

      guard.exit(first);
      assert.equal(guard.isIdle, false);

      guard.exit(second);
      assert.equal(guard.isIdle, true);
    });

    it("should reject a chain that is already inside the construction", () => {
      const registration = Lifestyles.transient.createRegistration(
        Service,
        () => new Service(),
        new DiContainer()
      );
      const guard = registration.cycleGuard;
      const link = guard.enter(undefined);

      assert.throws(() => guard.enter(link), CyclicDependencyError);
      guard.exit(link);
      assert.equal(guard.isIdle, true);
    });

    it("should reject a descendant of an in-flight construction", () => {
      const container = new DiContainer();
      const registration = Lifestyles.transient.createRegistration(
        Service,
        () => new Service(),
        container
      );
      const dependency = Lifestyles.transient.createRegistration(
        Dependency,
        () => new Dependency(),
        container
      );
      const link = registration.cycleGuard.enter(undefined);
      const child = new ResolutionChain(dependency, link);

      assert.throws(
        () => registration.cycleGuard.enter(child),
        (err: unknown) => {
          assert.ok(err instanceof CyclicDependencyError);
          assert.deepEqual(err.chain, ["Service", "Dependency", "Service"]);
          return true;
        }
      );
    });

    it("should let unrelated chains in at the same time", () => {
      const container = new DiContainer();
      const registration = Lifestyles.transient.createRegistration(
        Service,
        () => new Service(),
        container
      );
      const other = Lifestyles.transient.createRegistration(
        Dependency,
        () => new Dependency(),
        container
      );
      const inFlight = registration.cycleGuard.enter(undefined);
      const unrelated = new ResolutionChain(other, undefined);

      const link = registration.cycleGuard.enter(unrelated);
      assert.equal(link.parent, unrelated);

      registration.cycleGuard.exit(link);
      registration.cycleGuard.exit(inFlight);
      assert.equal(registration.cycleGuard.isIdle, true);
    });
  });

  describe("through producers", () => {
    it("should fail when a construction resolves its own producer", async () => {
      const container = new DiContainer();
      const producer: InstanceProducer<Service> =
        Lifestyles.transient.createProducer(
          Service,
          async () => {
            await producer.getInstance();
            return new Service();
          },
          container
        );

      await assert.rejects(producer.getInstance(), (err: unknown) => {
        assert.ok(err instanceof CyclicDependencyError);
        assert.equal(err.token, Service);
        assert.deepEqual(err.chain, ["Service", "Service"]);
        return true;
      });
      assert.equal(producer.registration.cycleGuard.isIdle, true);
    });

    it("should detect an indirect cycle and report the whole chain", async () => {
      const container = new DiContainer()
        .registerFactory("A", async (c) => {
          await c.resolveRequired("B");
          return { name: "a" };
        })
        .registerFactory("B", async (c) => {
          await c.resolveRequired("C");
          return { name: "b" };
        })
        .registerFactory("C", async (c) => {
          await c.resolveRequired("A");
          return { name: "c" };
        });

      await assert.rejects(container.resolveRequired("A"), (err: unknown) => {
        assert.ok(err instanceof CyclicDependencyError);
        assert.deepEqual(err.chain, ["A", "B", "C", "A"]);
        assert.equal(err.cause, "A -> B -> C -> A");
        return true;
      });
    });

    it("should fail instead of hanging when two chains build singletons that depend on each other", async () => {
      const container = new DiContainer()
        .registerFactory(
          "A",
          async (c) => {
            await setImmediate();
            return { b: await c.resolveRequired("B") };
          },
          { lifestyle: Lifestyles.singleton }
        )
        .registerFactory(
          "B",
          async (c) => {
            await setImmediate();
            return { a: await c.resolveRequired("A") };
          },
          { lifestyle: Lifestyles.singleton }
        );

      const [first, second] = await Promise.allSettled([
        container.resolveRequired("A"),
        container.resolveRequired("B"),
      ]);

      assert.equal(first.status, "rejected");
      assert.equal(second.status, "rejected");
      if (first.status === "rejected" && second.status === "rejected") {
        assert.ok(first.reason instanceof CyclicDependencyError);
        assert.ok(second.reason instanceof CyclicDependencyError);
        assert.deepEqual(first.reason.chain, ["A", "B", "A"]);
        assert.deepEqual(second.reason.chain, ["B", "A", "B"]);
      }
    });

    it("should not fail when two unrelated chains build the same registration concurrently", async () => {
      let created = 0;
      const producer = Lifestyles.transient.createProducer(
        Service,
        async () => {
          created++;
          await setImmediate();
          return new Service();
        },
        new DiContainer()
      );

      const [first, second] = await Promise.all([
        producer.getInstance(),
        producer.getInstance(),
      ]);

      assert.equal(created, 2);
      assert.notStrictEqual(first, second);
      assert.equal(producer.registration.cycleGuard.isIdle, true);
    });

    it("should not fail when one construction builds the same dependency twice in parallel", async () => {
      const container = new DiContainer()
        .registerFactory("Child", async () => {
          await setImmediate();
          return { name: "child" };
        })
        .registerFactory("Parent", async (c) => {
          const children = await Promise.all([
            c.resolveRequired("Child"),
            c.resolveRequired("Child"),
          ]);
          return { children };
        });

      const parent = await container.resolveRequired<{ children: unknown[] }>(
        "Parent"
      );

      assert.equal(parent.children.length, 2);
      assert.notStrictEqual(parent.children[0], parent.children[1]);
    });

    it("should exit the guard when the construction throws", async () => {
      let attempts = 0;
      const producer = Lifestyles.transient.createProducer(
        Service,
        () => {
          attempts++;
          if (attempts === 1) {
            throw new Error("construction failed");
          }
          return new Service();
        },
        new DiContainer()
      );

      await assert.rejects(producer.getInstance(), /construction failed/);
      assert.equal(producer.registration.cycleGuard.isIdle, true);

      const instance = await producer.getInstance();
      assert.ok(instance instanceof Service);
      assert.equal(attempts, 2);
    });
  });
});
