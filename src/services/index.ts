import type { Transporter } from "nodemailer";
import { Store } from "../db/store";
import { HttpClient } from "../providers/http-client";
import type { FetchFn } from "../providers/http-client";
import { PlaytomicProvider } from "../providers/playtomic";
import { ProviderRegistry } from "../providers/provider";
import type { CourtProvider } from "../providers/provider";
import { AlertService } from "./alerter";
import { AvailabilityCache } from "./cache";
import { LocationService } from "./locations";
import { createMailTransport } from "./mailer";
import { MailNotifier } from "./notifier";
import { AdminService } from "./refresh";
import { SearchOrderScheduler } from "./scheduler";
import { SearchEngine } from "./search";
import { SearchOrderService } from "./search-orders";
import { TaskRunner } from "./tasks";
import type { Config } from "../config";
import type { DB } from "../db/client";

export interface Services {
  store: Store;
  providers: ProviderRegistry;
  cache: AvailabilityCache;
  engine: SearchEngine;
  tasks: TaskRunner;
  locations: LocationService;
  orders: SearchOrderService;
  admin: AdminService;
  scheduler: SearchOrderScheduler;
}

export interface ServiceOverrides {
  providers?: CourtProvider[];
  fetchFn?: FetchFn;
  transporter?: Transporter | null;
  now?: () => Date;
}

/**
 * Wire every service explicitly; nothing in the core is a module singleton
 */
export function createServices(config: Config, db: DB, overrides: ServiceOverrides = {}): Services {
  const now = overrides.now ?? (() => new Date());
  const store = new Store(db);

  const providers = new ProviderRegistry(
    overrides.providers ?? [
      new PlaytomicProvider(new HttpClient({ timeoutMs: config.provider.timeoutMs, fetchFn: overrides.fetchFn })),
    ]
  );

  const transporter =
    overrides.transporter === undefined ? createMailTransport(config.mail) : overrides.transporter;

  const cache = new AvailabilityCache(store, providers, config.cache, now);
  const engine = new SearchEngine(store, cache, providers, config.search);
  const tasks = new TaskRunner(engine, { retentionHours: config.tasks.retentionHours }, now);
  const locations = new LocationService(store, providers, { timezone: config.timezone });
  const notifier = new MailNotifier(store, transporter, {
    from: config.mail.from,
    appBaseUrl: config.appBaseUrl,
  });
  const orders = new SearchOrderService(store, engine, notifier, { timezone: config.timezone }, now);
  const admin = new AdminService(store, cache, locations);
  const alerts = new AlertService(
    transporter,
    { from: config.mail.from, to: config.mail.alertTo, cooldownMinutes: config.mail.cooldownMinutes },
    now
  );
  const scheduler = new SearchOrderScheduler(store, orders, tasks, alerts, {
    enabled: config.scheduler.enabled,
    schedule: config.scheduler.schedule,
  });

  return { store, providers, cache, engine, tasks, locations, orders, admin, scheduler };
}
