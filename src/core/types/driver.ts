/**
 * Page automation capability consumed by the crawl engine
 */

export type WaitState = "attached" | "visible" | "hidden";

export interface ElementHandle {
  textContent(): Promise<string | null>;
  getAttribute(name: string): Promise<string | null>;
  /** First descendant matching `selector` (row cells) */
  query(selector: string): Promise<ElementHandle | null>;
  click(): Promise<void>;
}

/** One isolated browsing session; never shared between workers */
export interface Session {
  navigate(url: string, timeoutMs: number): Promise<void>;
  waitFor(selector: string, timeoutMs: number, state: WaitState): Promise<void>;
  waitForNetworkIdle(timeoutMs: number): Promise<void>;
  queryAll(selector: string): Promise<ElementHandle[]>;
  query(selector: string): Promise<ElementHandle | null>;
  close(): Promise<void>;
}

export interface PageDriver {
  openSession(): Promise<Session>;
  close(): Promise<void>;
}
