/**
 * Narrow view of a rendered document. Extraction code only talks to these interfaces, so any
 * engine that can navigate and answer selector queries can drive the pipeline.
 */
export interface PageElement {
  attribute: (name: string) => Promise<string | null>;
  text: () => Promise<string>;
  /** True when the element has an ancestor (or is itself) matching `selector`. */
  within: (selector: string) => Promise<boolean>;
}

export interface RenderedPage {
  url: () => string;
  title: () => Promise<string>;
  queryAll: (selector: string) => Promise<PageElement[]>;
  queryOne: (selector: string) => Promise<PageElement | null>;
  bodyText: () => Promise<string>;
}

export interface NavigateOptions {
  timeoutMs: number;
  settleMs: number;
  signal?: AbortSignal;
}

export interface BrowserSession {
  readonly id: string;
  navigate: (url: string, options: NavigateOptions) => Promise<RenderedPage>;
  close: () => Promise<void>;
}

export interface SessionFactory {
  readonly engine: string;
  create: () => Promise<BrowserSession>;
  shutdown: () => Promise<void>;
}

export class NavigationError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly timedOut: boolean,
  ) {
    super(message);
    this.name = 'NavigationError';
  }
}
