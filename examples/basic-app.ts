/**
 * @tracewell/core v1.0.0 - Basic Example
 *
 * Demonstrates the core concepts:
 * - Transactions opened per incoming request
 * - Transactional and service tracers configured from the environment
 * - Domain exceptions and external interaction errors
 * - Exception filters turning failures into responses
 *
 * Note: the payment gateway is an in-memory stand-in.
 */

import {
  createServiceTracer,
  createTransactionalTracer,
  DefaultExceptionFilter,
  DomainExceptionFilter,
  ErrorResponse,
  ExceptionFilterChain,
  ExternalInteractionExceptionFilter,
  ITransactionalTracer,
  loadTracingConfig,
  NotAllowed,
  NotFound,
  TimeoutExtException,
  transactionManager,
} from '../src/index';

// ==================== Domain ====================

interface Order {
  id: string;
  customerId: string;
  total: number;
  locked: boolean;
}

const orders = new Map<string, Order>([
  ['order-1', { id: 'order-1', customerId: 'customer-7', total: 120, locked: false }],
  ['order-2', { id: 'order-2', customerId: 'customer-7', total: 80, locked: true }],
  ['order-3', { id: 'order-3', customerId: 'customer-9', total: 9999, locked: false }],
]);

// ==================== Payment Gateway ====================

class FakePaymentGateway {
  async charge(order: Order): Promise<string> {
    await new Promise((resolve) => setTimeout(resolve, 10));
    if (order.total > 5000) {
      throw new TimeoutExtException(`Gateway timed out charging ${order.id}`);
    }
    return `receipt-${order.id}`;
  }
}

// ==================== Service ====================

class OrderService {
  constructor(
    private readonly tracer: ITransactionalTracer,
    private readonly gateway: FakePaymentGateway,
  ) {}

  async pay(orderId: string): Promise<string> {
    this.tracer.info('paying order', {
      checkpointId: 'lookup',
      extra: { orderId },
    });

    const order = orders.get(orderId);
    if (!order) {
      throw new NotFound('order-not-found', `Order ${orderId} not found`);
    }
    if (order.locked) {
      throw new NotAllowed('order-locked', `Order ${orderId} is locked`);
    }

    this.tracer.reportStartExternal('charging card', { checkpointId: 'payment' });
    try {
      return await this.gateway.charge(order);
    } finally {
      this.tracer.reportEndExternal('charging card', { checkpointId: 'payment' });
    }
  }
}

// ==================== Bootstrap ====================

async function main(): Promise<void> {
  const config = loadTracingConfig();
  const tracer = createTransactionalTracer(config);
  const serviceTracer = createServiceTracer(config);

  const service = new OrderService(tracer, new FakePaymentGateway());
  const filters = new ExceptionFilterChain().addFilters([
    new DomainExceptionFilter({ tracer }),
    new ExternalInteractionExceptionFilter({ tracer }),
    new DefaultExceptionFilter({ tracer }),
  ]);

  serviceTracer.info('example started', { checkpointId: 'startup' });

  const handle = (orderId: string): Promise<ErrorResponse | string> =>
    transactionManager.runTransaction(async () => {
      try {
        return await service.pay(orderId);
      } catch (error) {
        return filters.catch({ error, timestamp: new Date() });
      }
    });

  const results = await Promise.all(
    ['order-1', 'order-2', 'order-3', 'order-404'].map(handle),
  );

  for (const result of results) {
    serviceTracer.info(
      typeof result === 'string'
        ? { receipt: result }
        : { status: result.status, message: result.body.message },
      { checkpointId: 'result' },
    );
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
