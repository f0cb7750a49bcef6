/**
 * src/modules/subscriptions/subscription.controller.ts
 *
 * WHY:
 * - Maps HTTP → SubscriptionService for billing endpoints.
 *
 * RULES:
 * - No DB access here.
 * - The webhook handler receives the raw body (Buffer); signature checks need the exact bytes.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseInput } from '../../shared/http/parse-input';
import { requireUser } from '../../shared/http/require-auth-context';
import { SubscriptionErrors } from './subscription.errors';
import {
  billingAddressSchema,
  billingHistoryQuerySchema,
  changePlanSchema,
  createSubscriptionSchema,
  paymentMethodSchema,
} from './subscription.schemas';
import type { SubscriptionService } from './subscription.service';

export class SubscriptionController {
  constructor(private readonly service: SubscriptionService) {}

  async plans(_req: FastifyRequest, reply: FastifyReply) {
    return reply.status(200).send({ plans: this.service.listPlans() });
  }

  async current(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    return reply.status(200).send(await this.service.current(userId));
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(createSubscriptionSchema, req.body);

    const result = await this.service.create({
      userId,
      requestId: req.requestContext.requestId,
      planType: body.plan_type,
      billingCycle: body.billing_cycle,
      paymentMethodId: body.payment_method_id ?? null,
    });

    return reply.status(201).send(result);
  }

  async paymentMethod(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(paymentMethodSchema, req.body);
    return reply.status(200).send(await this.service.addPaymentMethod(userId, body.token));
  }

  async changePlan(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(changePlanSchema, req.body);

    const result = await this.service.changePlan({
      userId,
      requestId: req.requestContext.requestId,
      newPlanType: body.new_plan_type,
      billingCycle: body.billing_cycle ?? null,
    });

    return reply.status(200).send(result);
  }

  async cancel(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    return reply.status(200).send(await this.service.cancel(userId, req.requestContext.requestId));
  }

  async reactivate(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const result = await this.service.reactivate(userId, req.requestContext.requestId);
    return reply.status(200).send(result);
  }

  async usage(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    return reply.status(200).send(await this.service.usage(userId));
  }

  async billingHistory(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const query = parseInput(billingHistoryQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.service.billingHistory(userId, query.limit));
  }

  async billingAddress(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(billingAddressSchema, req.body);

    const result = await this.service.updateBillingAddress(userId, {
      line1: body.line1,
      line2: body.line2 ?? null,
      city: body.city,
      state: body.state,
      postalCode: body.postal_code,
      country: body.country,
    });

    return reply.status(200).send(result);
  }

  async webhook(req: FastifyRequest, reply: FastifyReply) {
    const signature = req.headers['stripe-signature'];
    if (typeof signature !== 'string' || !Buffer.isBuffer(req.body)) {
      throw SubscriptionErrors.invalidWebhookSignature();
    }

    const result = await this.service.handleWebhook({
      rawBody: req.body,
      signature,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }
}
