/**
 * Default step catalogue.
 *
 * The order is part of the contract: themes before anything reading theme
 * directories, loading before page creation, generation before menus and
 * rendering, static copying and rendering before saving, saving before
 * optimization.
 *
 * @module
 */

import type { StepConstructor } from "../build/Step.js";
import { ThemesImport } from "./ThemesImport.js";
import { PagesLoad } from "./PagesLoad.js";
import { DataLoad } from "./DataLoad.js";
import { StaticLoad } from "./StaticLoad.js";
import { PagesCreate } from "./PagesCreate.js";
import { PagesConvert } from "./PagesConvert.js";
import { TaxonomiesCreate } from "./TaxonomiesCreate.js";
import { PagesGenerate } from "./PagesGenerate.js";
import { MenusCreate } from "./MenusCreate.js";
import { StaticCopy } from "./StaticCopy.js";
import { PagesRender } from "./PagesRender.js";
import { PagesSave } from "./PagesSave.js";
import { HtmlOptimize } from "./HtmlOptimize.js";
import { CssOptimize } from "./CssOptimize.js";
import { JsOptimize } from "./JsOptimize.js";

export const DEFAULT_STEPS: readonly StepConstructor[] = Object.freeze([
  ThemesImport,
  PagesLoad,
  DataLoad,
  StaticLoad,
  PagesCreate,
  PagesConvert,
  TaxonomiesCreate,
  PagesGenerate,
  MenusCreate,
  StaticCopy,
  PagesRender,
  PagesSave,
  HtmlOptimize,
  CssOptimize,
  JsOptimize,
]);

export { StaticOptimize } from "./StaticOptimize.js";

export {
  ThemesImport,
  PagesLoad,
  DataLoad,
  StaticLoad,
  PagesCreate,
  PagesConvert,
  TaxonomiesCreate,
  PagesGenerate,
  MenusCreate,
  StaticCopy,
  PagesRender,
  PagesSave,
  HtmlOptimize,
  CssOptimize,
  JsOptimize,
};
