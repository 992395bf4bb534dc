/**
 * Site configuration schema.
 *
 * Every key has a default, so an empty `quire.yml` (or none at all) yields a
 * complete configuration. Unknown top-level keys are kept: steps and
 * templates may read their own settings through `Config.get()`.
 *
 * @module
 */

import { z } from "zod";

const nonEmptyString = (fieldName: string) =>
  z
    .string()
    .transform((s) => s.trim())
    .refine((s) => s.length > 0, { message: `${fieldName} cannot be empty` });

const LanguageSchema = z.object({
  code: nonEmptyString("Language code"),
  name: z.string().optional(),
});

/**
 * A menu entry declared in configuration.
 */
const MenuEntrySchema = z.object({
  id: nonEmptyString("Menu entry id"),
  name: nonEmptyString("Menu entry name"),
  url: z.string(),
  weight: z.number().int().default(0),
  /** Id of the parent entry in the same menu */
  parent: z.string().optional(),
});

const DirSchema = (defaultDir: string) =>
  z.object({ dir: z.string().default(defaultDir) }).default({});

export const SiteConfigSchema = z
  .object({
    title: z.string().default(""),
    baseurl: z.string().default(""),
    language: nonEmptyString("language").default("en"),
    languages: z.array(LanguageSchema).default([]),
    debug: z.boolean().default(false),

    /** One theme name or a list, highest priority first */
    theme: z
      .union([z.string(), z.array(nonEmptyString("Theme name"))])
      .default([])
      .transform((value) => {
        if (typeof value === "string") {
          const name = value.trim();
          return name.length > 0 ? [name] : [];
        }
        return value;
      }),

    pages: z
      .object({
        dir: z.string().default("pages"),
        ext: z.array(nonEmptyString("Page extension")).nonempty().default(["md", "markdown"]),
      })
      .default({}),
    data: z
      .object({
        dir: z.string().default("data"),
        load: z.boolean().default(true),
      })
      .default({}),
    static: z
      .object({
        dir: z.string().default("static"),
        load: z.boolean().default(true),
        exclude: z.array(z.string()).default([]),
      })
      .default({}),
    layouts: DirSchema("layouts"),
    themes: DirSchema("themes"),
    output: DirSchema("_site"),

    /** Plural vocabulary name -> singular term name */
    taxonomies: z.record(z.string()).default({ tags: "tag", categories: "category" }),

    menus: z.record(z.array(MenuEntrySchema)).default({}),

    generators: z
      .object({
        section: z.boolean().default(true),
        taxonomy: z.boolean().default(true),
        homepage: z.boolean().default(true),
        alias: z.boolean().default(true),
        redirect: z.boolean().default(true),
        sitemap: z.boolean().default(true),
      })
      .default({}),

    optimize: z
      .object({
        enabled: z.boolean().default(false),
        html: z.boolean().default(true),
        css: z.boolean().default(true),
        js: z.boolean().default(true),
      })
      .default({}),

    /** Free-form values exposed to templates as `site.params` */
    params: z.record(z.unknown()).default({}),
  })
  .passthrough();

/** Configuration as written by users (every key optional) */
export type SiteConfigInput = z.input<typeof SiteConfigSchema>;

/** Fully resolved configuration */
export type SiteConfig = z.output<typeof SiteConfigSchema>;

export type MenuEntryConfig = z.output<typeof MenuEntrySchema>;

export type LanguageConfig = z.output<typeof LanguageSchema>;
