import { MockAgent, getGlobalDispatcher, setGlobalDispatcher } from 'undici';
import type { Dispatcher } from 'undici';
import { zipSync, strToU8 } from 'fflate';

export const ORIGIN = 'http://opendata.test';
export const CLIMATE_ROOT = `${ORIGIN}/climate/`;

export interface MockServer {
  agent: MockAgent;
  pool: ReturnType<MockAgent['get']>;
  restore: () => Promise<void>;
}

export function installMockServer(): MockServer {
  const previous: Dispatcher = getGlobalDispatcher();
  const agent = new MockAgent();
  agent.disableNetConnect();
  setGlobalDispatcher(agent);
  return {
    agent,
    pool: agent.get(ORIGIN),
    restore: async () => {
      setGlobalDispatcher(previous);
      await agent.close();
    }
  };
}

/** Apache style directory listing, the format the open-data server answers with. */
export function listingHtml(path: string, links: string[]): string {
  const rows = links.map((link) => `<a href="${link}">${link}</a>                 18-Oct-2026 10:00       -`).join('\n');
  return [
    '<html>',
    `<head><title>Index of ${path}</title></head>`,
    '<body>',
    `<h1>Index of ${path}</h1><hr><pre><a href="../">../</a>`,
    rows,
    '</pre><hr></body>',
    '</html>'
  ].join('\n');
}

export function zipArchive(members: Record<string, string | Uint8Array>): Uint8Array {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, content] of Object.entries(members)) {
    entries[name] = typeof content === 'string' ? strToU8(content) : content;
  }
  return zipSync(entries);
}

export function latin1(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'latin1'));
}
