import { GeneratorRegistry } from "./Generator.js";
import { SectionGenerator } from "./generators/SectionGenerator.js";
import { TaxonomyGenerator } from "./generators/TaxonomyGenerator.js";
import { HomepageGenerator } from "./generators/HomepageGenerator.js";
import { AliasGenerator, RedirectGenerator } from "./generators/RedirectGenerators.js";
import { SitemapGenerator } from "./generators/SitemapGenerator.js";

/**
 * Registry with every built-in generator. Each one still checks its own
 * `generators.<name>` setting.
 */
export function createDefaultGeneratorRegistry(): GeneratorRegistry {
  return new GeneratorRegistry()
    .register(new SectionGenerator())
    .register(new TaxonomyGenerator())
    .register(new HomepageGenerator())
    .register(new AliasGenerator())
    .register(new RedirectGenerator())
    .register(new SitemapGenerator());
}
