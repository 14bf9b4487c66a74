import { Registry, Counter } from "prom-client";

export const registry = new Registry();

export const cacheHits = new Counter({
  name: "canonkey_cache_hits_total",
  help: "Reads of a cached attribute served from its per-instance slot",
  labelNames: ["attribute"],
  registers: [registry],
});

export const cacheMisses = new Counter({
  name: "canonkey_cache_misses_total",
  help: "Reads of a cached attribute that ran the underlying computation",
  labelNames: ["attribute"],
  registers: [registry],
});
