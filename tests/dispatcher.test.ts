import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { createBlueprint } from "../src/entities/blueprint.js";
import { defineEntity, defineTransform } from "../src/entities/define.js";
import { dispatch, EntityInstance, TransformDispatcher } from "../src/entities/dispatcher.js";
import { textInput } from "../src/entities/elements.js";
import { EntityRegistry } from "../src/entities/registry.js";
import type { ExecutionContext, GraphNode, TransformRun } from "../src/entities/types.js";
import { unavailableDriverFactory } from "../src/runtime/driver.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const context: ExecutionContext = { driverFactory: unavailableDriverFactory, settings: { region: "test" } };

function urlNode(value: string, transform = "To website"): GraphNode {
  return {
    id: 1,
    data: { label: "URL", elements: [{ type: "text", label: "URL", value }] },
    transform,
  };
}

function urlEntity(run: TransformRun, options: { edgeLabel?: string } = {}): EntityInstance {
  return new EntityInstance(
    defineEntity({
      label: "URL",
      layout: [textInput({ label: "URL" })],
      transforms: [defineTransform("To website", run, options)],
    }),
  );
}

describe("dispatcher/dispatch", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("turns a URL into a website record carrying the default edge label", async () => {
    const logger = new RecordingLogger();
    const registry = new EntityRegistry({ logger });
    registry.register(defineEntity({ label: "Website", layout: [textInput({ label: "Domain" })] }));

    const seen: unknown[] = [];
    const instance = urlEntity((input) => {
      seen.push(input.toJSON());
      const url = input.getString("url");
      return url ? createBlueprint("website", { domain: new URL(url).hostname }, registry) : [];
    });

    const records = await new TransformDispatcher({ logger }).dispatch(
      instance,
      "To website",
      urlNode("https://www.example.test/about"),
      context,
    );

    expect(seen).to.deep.equal([{ url: "https://www.example.test/about" }]);
    expect(records).to.deep.equal([
      {
        label: "Website",
        color: "#145070",
        icon: "atom-2",
        data: {
          elements: [
            { type: "text", label: "Domain", style: {}, icon: "IconAlphabetLatin", value: "www.example.test" },
          ],
        },
        edge_label: "transformed_to",
      },
    ]);
  });

  it("resolves the transform by any spelling of its label", async () => {
    const run = sinon.stub<Parameters<TransformRun>, ReturnType<TransformRun>>().returns([{ label: "Website" }]);
    const instance = urlEntity(run);
    const dispatcher = new TransformDispatcher({ logger: new RecordingLogger() });

    for (const spelling of ["to_website", "TO WEBSITE", "to-website"]) {
      const records = await dispatcher.dispatch(instance, spelling, urlNode("https://example.test"), context);
      expect(records, spelling).to.deep.equal([{ label: "Website", edge_label: "transformed_to" }]);
    }
    expect(run.callCount).to.equal(3);
  });

  it("returns an empty list for an unknown transform without invoking any handler", async () => {
    const logger = new RecordingLogger();
    const run = sinon.spy();
    const instance = urlEntity(run);

    const records = await dispatch(instance, "To phone", urlNode("https://example.test"), context, { logger });

    expect(records).to.deep.equal([]);
    expect(run.called).to.equal(false);
    const warning = logger.find("transform_not_found");
    expect(warning?.level).to.equal("warn");
    expect(warning?.payload).to.deep.equal({
      entity: "URL",
      transform: "To phone",
      normalized: "to_phone",
      available: ["To website"],
    });
  });

  it("rethrows the handler error unchanged after logging it", async () => {
    const logger = new RecordingLogger();
    const failure = new Error("upstream refused");
    const instance = urlEntity(sinon.stub().rejects(failure));

    let caught: unknown;
    try {
      await new TransformDispatcher({ logger }).dispatch(instance, "To website", urlNode("https://example.test"), context);
    } catch (error) {
      caught = error;
    }

    expect(caught).to.equal(failure);
    const logged = logger.find("transform_dispatch_failed");
    expect(logged?.level).to.equal("error");
    expect(logged?.transform).to.equal("To website");
    expect(logged?.payload).to.include.keys("error", "duration_ms");
    expect(logger.find("transform_dispatch_completed")).to.equal(undefined);
  });

  it("hands the execution context to the handler unchanged", async () => {
    const run = sinon.stub<Parameters<TransformRun>, ReturnType<TransformRun>>().returns(null);
    await dispatch(urlEntity(run), "To website", urlNode("https://example.test"), context, {
      logger: new RecordingLogger(),
    });
    expect(run.calledOnce).to.equal(true);
    expect(run.firstCall.args[1]).to.equal(context);
  });

  it("normalises null, single and custom edge label outputs", async () => {
    const logger = new RecordingLogger();
    const dispatcher = new TransformDispatcher({ logger });

    const none = await dispatcher.dispatch(urlEntity(() => null), "To website", urlNode("a"), context);
    const nothing = await dispatcher.dispatch(urlEntity(() => undefined), "To website", urlNode("a"), context);
    const single = await dispatcher.dispatch(
      urlEntity(() => ({ label: "Website" }), { edgeLabel: "hosted_on" }),
      "To website",
      urlNode("a"),
      context,
    );

    expect(none).to.deep.equal([]);
    expect(nothing).to.deep.equal([]);
    expect(single).to.deep.equal([{ label: "Website", edge_label: "hosted_on" }]);
  });

  it("overwrites an edge label set by the handler", async () => {
    const records = await dispatch(
      urlEntity(() => [{ label: "Website", edge_label: "custom" }]),
      "To website",
      urlNode("a"),
      context,
      { logger: new RecordingLogger() },
    );
    expect(records).to.deep.equal([{ label: "Website", edge_label: "transformed_to" }]);
  });

  it("rejects records that are not objects", async () => {
    const instance = new EntityInstance(
      defineEntity({
        label: "URL",
        transforms: [
          {
            label: "To website",
            run: async () => {
              const produced: unknown = ["not a record"];
              return Array.isArray(produced) ? produced : [];
            },
          },
        ],
      }),
    );

    let caught: unknown;
    try {
      await dispatch(instance, "To website", urlNode("a"), context, { logger: new RecordingLogger() });
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(TypeError);
    expect(caught instanceof Error ? caught.message : "").to.equal(
      'transform "To website" returned a non-object record at index 0',
    );
  });

  it("lets a later transform replace an earlier one with the same normalised label", async () => {
    const instance = new EntityInstance(
      defineEntity({
        label: "URL",
        transforms: [
          defineTransform("To website", () => [{ label: "first" }]),
          defineTransform("to_website", () => [{ label: "second" }]),
        ],
      }),
    );

    const records = await dispatch(instance, "To website", urlNode("a"), context, { logger: new RecordingLogger() });

    expect(records).to.deep.equal([{ label: "second", edge_label: "transformed_to" }]);
    expect(instance.transformLabels()).to.deep.equal([
      { label: "To website", icon: "list" },
      { label: "to_website", icon: "list" },
    ]);
  });
});

describe("dispatcher/correlation", () => {
  it("stamps every entry of a dispatch, handler logs included, with one dispatch id", async () => {
    const logger = new RecordingLogger();
    const instance = urlEntity(() => {
      logger.info("handler_step");
      return [];
    });

    await new TransformDispatcher({ logger }).dispatch(instance, "to website", urlNode("a"), context);

    const started = logger.find("transform_dispatch_started");
    const step = logger.find("handler_step");
    const completed = logger.find("transform_dispatch_completed");
    expect(started?.dispatchId).to.be.a("string");
    expect(step?.dispatchId).to.equal(started?.dispatchId);
    expect(completed?.dispatchId).to.equal(started?.dispatchId);
    expect(completed?.transform).to.equal("To website");
  });

  it("gives concurrent dispatches distinct identifiers", async () => {
    const logger = new RecordingLogger();
    const instance = urlEntity(async () => {
      await new Promise((resolve) => setImmediate(resolve));
      return [];
    });
    const dispatcher = new TransformDispatcher({ logger });

    await Promise.all([
      dispatcher.dispatch(instance, "To website", urlNode("a"), context),
      dispatcher.dispatch(instance, "To website", urlNode("b"), context),
    ]);

    const ids = new Set(
      logger.entries.filter((entry) => entry.message === "transform_dispatch_completed").map((entry) => entry.dispatchId),
    );
    expect(ids.size).to.equal(2);
  });

  it("measures the duration with the injected clock", async () => {
    const logger = new RecordingLogger();
    const clock = sinon.stub<[], number>();
    clock.onFirstCall().returns(100);
    clock.onSecondCall().returns(130);

    await new TransformDispatcher({ logger, clock }).dispatch(
      urlEntity(() => [{ label: "Website" }]),
      "To website",
      urlNode("a"),
      context,
    );

    expect(logger.find("transform_dispatch_completed")?.payload).to.deep.equal({
      records: 1,
      edge_label: "transformed_to",
      duration_ms: 30,
    });
  });
});
