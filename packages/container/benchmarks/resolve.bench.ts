import { Bench } from 'tinybench';
import { Container, Inject, Injectable, Lifetime, contract } from '../src/index.js';

/**
 * Resolution benchmark
 *
 * Measures registration, the first (cold) resolution of a three-level graph,
 * cached singleton lookup, transient construction and the async path.
 */

// --- Services ---
const loggerC = contract<Logger>('Logger');
@Injectable({ provide: loggerC })
class Logger {
  log(_message: string) {
    return undefined;
  }
}

const configC = contract<Config>('Config');
@Injectable({ provide: configC })
class Config {
  getValue() {
    return 'eu-west';
  }
}

const storeC = contract<Store>('Store');
@Injectable({ provide: storeC })
class Store {
  constructor(@Inject(loggerC) private readonly logger: Logger) {}
  query() {
    this.logger.log('query');
    return 'order';
  }
}

const orderRepositoryC = contract<OrderRepository>('OrderRepository');
@Injectable({ provide: orderRepositoryC })
class OrderRepository {
  constructor(@Inject(storeC) private readonly store: Store) {}
  findOrder(_id: string) {
    return this.store.query();
  }
}

const checkoutServiceC = contract<CheckoutService>('CheckoutService');
@Injectable({ provide: checkoutServiceC, lifetime: Lifetime.Transient })
class CheckoutService {
  constructor(
    @Inject(orderRepositoryC) private readonly repo: OrderRepository,
    @Inject(configC) private readonly config: Config,
    @Inject(loggerC) private readonly logger: Logger
  ) {}
  checkout(id: string) {
    this.logger.log(`Checkout ${id} (${this.config.getValue()})`);
    return this.repo.findOrder(id);
  }
}

const bootstrap = () =>
  new Container({
    name: 'Bench',
    providers: [Logger, Config, Store, OrderRepository, CheckoutService],
  });

async function runResolveBenchmark() {
  console.log('=== Resolution Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  const warm = bootstrap();
  warm.resolve(checkoutServiceC);

  bench
    .add('T1: Bootstrap only', () => {
      bootstrap();
    })
    .add('T2: Cold start (bootstrap + first resolve)', () => {
      bootstrap().resolve(checkoutServiceC);
    })
    .add('T3: Warm singleton resolve', () => {
      warm.resolve(orderRepositoryC);
    })
    .add('T4: Transient resolve over cached singletons', () => {
      warm.resolve(checkoutServiceC);
    })
    .add('T5: Async transient resolve', async () => {
      await warm.resolveAsync(checkoutServiceC);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getMs = (name: string) => bench.tasks.find((t) => t.name === name)?.result?.period ?? 0;

  const bootstrapMs = getMs('T1: Bootstrap only');
  const coldMs = getMs('T2: Cold start (bootstrap + first resolve)');
  const warmNs = getMs('T3: Warm singleton resolve') * 1_000_000;

  console.log('\nBreakdown:');
  console.log(`  Registration (T1):        ${bootstrapMs.toFixed(3)} ms`);
  console.log(`  Instantiation (T2 - T1):  ${(coldMs - bootstrapMs).toFixed(3)} ms`);
  console.log(`  Warm resolve (T3):        ${warmNs.toFixed(0)} ns`);
}

runResolveBenchmark().catch(console.error);
