import { describe, it } from "mocha";
import { expect } from "chai";
import YAML from "yaml";

import { compileBlueprint } from "../src/entities/blueprint.js";
import { EntityLoader } from "../src/entities/loader.js";
import { EntityRegistry } from "../src/entities/registry.js";
import { renderManifestTemplate, templateHandlerName } from "../src/entities/template.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("template/renderManifestTemplate", () => {
  it("renders a manifest bound to the derived handler name", () => {
    const text = renderManifestTemplate({ label: "Crypto Wallet", description: "On-chain address", author: "alice" });

    expect(YAML.parse(text)).to.deep.equal({
      label: "Crypto Wallet",
      description: "On-chain address",
      author: "alice",
      color: "#145070",
      icon: "atom-2",
      is_available: true,
      elements: [{ type: "text", label: "Example", style: {}, icon: "IconAlphabetLatin" }],
      transforms: [{ label: "To example", icon: "list", handler: "crypto_wallet.to_example" }],
    });
    expect(templateHandlerName("Crypto Wallet")).to.equal("crypto_wallet.to_example");
  });

  it("loads through the loader once the handler is in the catalog", () => {
    const logger = new RecordingLogger();
    const registry = new EntityRegistry({ logger });
    const loader = new EntityLoader({
      registry,
      logger,
      handlers: { "crypto_wallet.to_example": () => [] },
    });

    loader.loadFromSource("crypto_wallet", renderManifestTemplate({ label: "Crypto Wallet" }));

    const descriptor = registry.lookup("crypto wallet");
    expect(descriptor?.transforms.map((transform) => transform.label)).to.deep.equal(["To example"]);
    if (descriptor) {
      expect(compileBlueprint(descriptor).data.elements).to.deep.equal([
        { type: "text", label: "Example", style: {}, icon: "IconAlphabetLatin" },
      ]);
    }
    expect(registry.listAvailable()).to.deep.equal([
      { label: "Crypto Wallet", description: "Description not available.", author: "Author not provided." },
    ]);
  });
});
