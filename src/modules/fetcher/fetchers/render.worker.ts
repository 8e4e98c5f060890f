/**
 * Render Worker
 * Source of the worker thread that builds the jsdom window. Page scripts run
 * inside it, so a script that never yields only blocks the worker, which the
 * host terminates on timeout.
 */

/**
 * Evaluated inside the window realm before the document is parsed. Replaces
 * the network APIs with recorders and returns the array they fill. Every
 * function the page can reach is created in its own realm.
 */
export const RECORDER_SCRIPT = `(function () {
  var observed = [];

  function record(via, target, method) {
    var url = String(target);
    try {
      url = new URL(url, document.baseURI).href;
    } catch (error) {
      url = String(target);
    }
    observed[observed.length] = { url: url, method: String(method || 'GET').toUpperCase(), via: via };
  }

  window.fetch = function (input, init) {
    var target = typeof input === 'string' ? input : input && (input.href || input.url);
    record('fetch', target, init && init.method);
    return new Promise(function () {});
  };

  XMLHttpRequest.prototype.open = function (method, url) {
    record('xhr', url, method);
  };
  XMLHttpRequest.prototype.send = function () {};

  function WebSocket(url) {
    record('websocket', url, 'GET');
    this.readyState = 3;
  }
  WebSocket.prototype.send = function () {};
  WebSocket.prototype.close = function () {};
  Object.defineProperty(window, 'WebSocket', { value: WebSocket, configurable: true, writable: true });

  Object.defineProperty(navigator, 'sendBeacon', {
    value: function (url) {
      record('beacon', url, 'POST');
      return true;
    },
    configurable: true,
  });

  return observed;
})()`;

export interface RenderJob {
  /**
   * Resolved path of the jsdom package
   */
  jsdomPath: string;
  html: string;
  url: string;
  visual: boolean;
  settleMs: number;
  recorderScript: string;
}

export const RENDER_WORKER_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const { JSDOM, VirtualConsole } = require(workerData.jsdomPath);

let observed = [];
const dom = new JSDOM(workerData.html, {
  url: workerData.url,
  contentType: 'text/html',
  runScripts: 'dangerously',
  pretendToBeVisual: workerData.visual,
  virtualConsole: new VirtualConsole(),
  beforeParse(window) {
    observed = window.eval(workerData.recorderScript);
  },
});

setTimeout(() => {
  const observedRequests = [];
  for (let i = 0; i < observed.length; i++) {
    const entry = observed[i];
    observedRequests.push({ url: String(entry.url), method: String(entry.method), via: String(entry.via) });
  }
  parentPort.postMessage({ body: dom.serialize(), observedRequests });
  dom.window.close();
}, workerData.settleMs);
`;
