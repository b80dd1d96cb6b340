import type { FastifyInstance, FastifyReply } from 'fastify';
import {
  bookingIdParam,
  changeStatusBody,
  confirmBody,
  createBookingBody,
  listBookingsQuery,
  releaseBody,
} from '../schemas';
import type { BookingService } from '../services/bookings';
import type { AvailabilityManager, TransitionResult } from '../services/availability';
import type { IdempotencyStore } from '../store/idempotency';
import type { ResourceId } from '../domain/types';
import { invalidInput, idempotencyKeyOf, sendFailure } from './replies';

interface BookingRoutesOpts {
  bookingService: BookingService;
  availabilityManager: AvailabilityManager;
  transitionReplays: IdempotencyStore<TransitionResult>;
  defaultResourceId: ResourceId;
}

function sendTransition(reply: FastifyReply, result: TransitionResult) {
  if (!result.success) {
    const extra = result.availableCapacity === undefined ? {} : { availableCapacity: result.availableCapacity };
    return sendFailure(reply, result.errorCode, result.message, extra);
  }

  return reply.status(200).send({
    booking: result.booking,
    from: result.from,
    effect: result.effect,
    slot: result.slot,
    warning: result.warning ?? null,
    message: result.message,
  });
}

export async function bookingRoutes(app: FastifyInstance, opts: BookingRoutesOpts) {
  const { bookingService, availabilityManager, transitionReplays, defaultResourceId } = opts;

  // replays a successful transition for a retried request carrying the same key
  async function withReplay(
    scope: string,
    key: string | undefined,
    run: () => Promise<TransitionResult>
  ): Promise<TransitionResult> {
    if (key) {
      const cached = transitionReplays.get(scope, key);
      if (cached) return cached;
    }
    const result = await run();
    if (key && result.success) transitionReplays.set(scope, key, result);
    return result;
  }

  app.post('/bookings', async (req, reply) => {
    const parsed = createBookingBody.safeParse(req.body);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const booking = await bookingService.createInquiry(
      { ...parsed.data, resourceId: parsed.data.resourceId ?? defaultResourceId },
      idempotencyKeyOf(req)
    );
    return reply.status(201).send(booking);
  });

  app.get('/bookings', async (req, reply) => {
    const parsed = listBookingsQuery.safeParse(req.query);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const items = bookingService.listBookings(parsed.data);
    return reply.status(200).send({ items, count: items.length });
  });

  app.get('/bookings/:id', async (req, reply) => {
    const parsed = bookingIdParam.safeParse(req.params);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const booking = bookingService.getBooking(parsed.data.id);
    if (!booking) return sendFailure(reply, 'NotFound', 'Booking not found');
    return reply.status(200).send(booking);
  });

  app.get('/bookings/:id/can-confirm', async (req, reply) => {
    const parsed = bookingIdParam.safeParse(req.params);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    return reply.status(200).send(availabilityManager.canConfirm(parsed.data.id));
  });

  app.post('/bookings/:id/status', async (req, reply) => {
    const params = bookingIdParam.safeParse(req.params);
    if (!params.success) return invalidInput(reply, params.error);
    const body = changeStatusBody.safeParse(req.body);
    if (!body.success) return invalidInput(reply, body.error);

    const { status, actor, date, time } = body.data;
    const slot = date && time ? { date, time } : undefined;
    const result = await withReplay(`status:${params.data.id}`, idempotencyKeyOf(req), () =>
      availabilityManager.changeStatus(params.data.id, status, actor, { slot })
    );
    return sendTransition(reply, result);
  });

  app.post('/bookings/:id/confirm', async (req, reply) => {
    const params = bookingIdParam.safeParse(req.params);
    if (!params.success) return invalidInput(reply, params.error);
    const body = confirmBody.safeParse(req.body);
    if (!body.success) return invalidInput(reply, body.error);

    const result = await withReplay(`confirm:${params.data.id}`, idempotencyKeyOf(req), () =>
      availabilityManager.confirm(params.data.id, body.data.actor)
    );
    return sendTransition(reply, result);
  });

  app.post('/bookings/:id/release', async (req, reply) => {
    const params = bookingIdParam.safeParse(req.params);
    if (!params.success) return invalidInput(reply, params.error);
    const body = releaseBody.safeParse(req.body);
    if (!body.success) return invalidInput(reply, body.error);

    const result = await withReplay(`release:${params.data.id}`, idempotencyKeyOf(req), () =>
      availabilityManager.release(params.data.id, body.data.actor, body.data.status)
    );
    return sendTransition(reply, result);
  });
}
