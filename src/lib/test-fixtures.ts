// Hand-made payloads shaped like a shared list page.

export const SHARE_URL = "https://www.google.com/maps/placelists/list/abc";

export const SAMPLE_SCRIPT =
  'window.APP_INITIALIZATION_STATE=[null,null,[0,0,"https://www.google.com/maps/placelists/list/abc"],["Jane"],"My List","A description",0,0,[[null,[0,0,0,0,"123 Main St",[0,0,40.1,-3.7]],"Cafe","Nice coffee"]]]';

export function pageWithScripts(...scripts: string[]): string {
  const tags = scripts.map((s) => `<script nonce="n1">${s}</script>`).join("\n");
  return `<!DOCTYPE html><html><head><title>Shared list</title>${tags}</head><body><div id="app"></div></body></html>`;
}
