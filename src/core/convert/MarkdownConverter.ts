/**
 * Markdown to HTML conversion (GitHub flavored, raw HTML kept).
 *
 * @module
 */

import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";
import rehypeStringify from "rehype-stringify";

export interface Converter {
  convert(markdown: string): Promise<string>;
}

export class MarkdownConverter implements Converter {
  private readonly processor = unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeStringify, { allowDangerousHtml: true });

  async convert(markdown: string): Promise<string> {
    const file = await this.processor.process(markdown);
    return String(file);
  }
}
