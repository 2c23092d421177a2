// markdown-it-texmath ships no type declarations and has no @types package.
declare module 'markdown-it-texmath' {
  import type MarkdownIt from 'markdown-it';

  interface TexmathOptions {
    engine?: unknown;
    delimiters?: string | string[];
    outerSpace?: boolean;
    katexOptions?: Record<string, unknown>;
  }

  function texmath(md: MarkdownIt, options?: TexmathOptions): void;

  export = texmath;
}
