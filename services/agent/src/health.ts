import http from "node:http";

import { jsonStringify } from "@triarb/common";
import type { RoundName, SynchronizedData } from "@triarb/common";

export type StateSource = () => { round: RoundName; sync: SynchronizedData };

export function createHealthServer(service: string, state: StateSource): http.Server {
  return http.createServer((req, res) => {
    if (req.url === "/healthz") {
      res.statusCode = 200;
      res.setHeader("content-type", "application/json");
      res.end(JSON.stringify({ ok: true, service }));
      return;
    }

    if (req.url === "/state") {
      res.statusCode = 200;
      res.setHeader("content-type", "application/json");
      res.end(jsonStringify(state()));
      return;
    }

    res.statusCode = 404;
    res.setHeader("content-type", "text/plain; charset=utf-8");
    res.end("not found\n");
  });
}
