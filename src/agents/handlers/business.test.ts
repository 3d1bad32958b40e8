/**
 * Business Handler Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { makeExecutionContext, makeTaskInput } from '@/testing/fixtures/engine.js';
import { createMemoryRecordGateway } from '../host-record-gateway.js';
import type { HostRecordGateway } from '../host-record-gateway.js';
import { BUSINESS_AGENTS, createBusinessHandler, customHandler, resolveAction } from './business.js';

describe('business handlers', () => {
  let gateway: HostRecordGateway;

  beforeEach(() => {
    gateway = createMemoryRecordGateway({
      lead: [{ name: 'Acme Corp' }, { name: 'Globex' }],
      product: [{ name: 'Standing Desk', qtyAvailable: 12, virtualQty: 20 }],
      employee: [{ name: 'Ada Byron' }, { name: 'Grace Brewster' }],
    });
  });

  describe('resolveAction', () => {
    it('prefers an explicit action over the text', () => {
      const task = makeTaskInput('crm', { action: 'search_leads', text: 'create a lead' });

      expect(resolveAction(task, BUSINESS_AGENTS.crm.rules)).toBe('search_leads');
    });

    it('infers the action from the first matching rule', () => {
      expect(
        resolveAction(makeTaskInput('crm', { text: 'find leads for acme' }), BUSINESS_AGENTS.crm.rules),
      ).toBe('search_leads');
      expect(
        resolveAction(makeTaskInput('crm', { text: 'add Acme as a lead' }), BUSINESS_AGENTS.crm.rules),
      ).toBe('create_lead');
    });
  });

  describe('crm', () => {
    it('creates a lead named after the subject of the text', async () => {
      const handler = createBusinessHandler('crm', gateway);

      const output = await handler(
        makeTaskInput('crm', { text: 'create a lead for Initech', goal: 'create a lead for Initech' }),
        makeExecutionContext('crm'),
      );

      expect(output).toEqual({ status: 'created', leadId: 3, name: 'Initech' });
      expect((await gateway.read('lead', 3))?.values).toEqual({ name: 'Initech' });
    });

    it('creates a lead from explicit fields', async () => {
      const handler = createBusinessHandler('crm', gateway);

      await handler(
        makeTaskInput('crm', {
          action: 'create_lead',
          fields: { name: 'Umbrella', email: 'ops@umbrella.test' },
        }),
        makeExecutionContext('crm'),
      );

      expect((await gateway.read('lead', 3))?.values).toEqual({
        name: 'Umbrella',
        email: 'ops@umbrella.test',
      });
    });

    it('searches leads by subject', async () => {
      const handler = createBusinessHandler('crm', gateway);

      const output = await handler(
        makeTaskInput('crm', { text: 'find leads for acme' }),
        makeExecutionContext('crm'),
      );

      expect(output).toEqual({ leads: [{ id: 1, name: 'Acme Corp' }] });
    });

    it('answers unknown_action for actions it does not know', async () => {
      const handler = createBusinessHandler('crm', gateway);

      await expect(
        handler(makeTaskInput('crm', { action: 'merge_leads' }), makeExecutionContext('crm')),
      ).resolves.toEqual({ status: 'unknown_action', action: 'merge_leads' });
      await expect(handler(makeTaskInput('crm', {}), makeExecutionContext('crm'))).resolves.toEqual({
        status: 'unknown_action',
      });
    });
  });

  describe('sales', () => {
    it('creates an order and links the lead a dependency created', async () => {
      const handler = createBusinessHandler('sales', gateway);

      const output = await handler(
        makeTaskInput('sales', { text: 'a sales order for Acme' }, {
          dependencyOutputs: { crm: { status: 'created', leadId: 7 } },
        }),
        makeExecutionContext('sales'),
      );

      expect(output).toEqual({ status: 'created', orderId: 1 });
      expect((await gateway.read('order', 1))?.values).toEqual({ customer: 'Acme', leadId: 7 });
    });
  });

  describe('inventory', () => {
    it('finds a product by the singular of a plural subject', async () => {
      const handler = createBusinessHandler('inventory', gateway);

      const output = await handler(
        makeTaskInput('inventory', { text: 'check stock for desks' }),
        makeExecutionContext('inventory'),
      );

      expect(output).toEqual({ productId: 1, name: 'Standing Desk', availableQty: 12, virtualQty: 20 });
    });

    it('reads a product by id', async () => {
      const handler = createBusinessHandler('inventory', gateway);

      const output = await handler(
        makeTaskInput('inventory', { action: 'check_stock', productId: 1 }),
        makeExecutionContext('inventory'),
      );

      expect(output).toMatchObject({ productId: 1, availableQty: 12 });
    });

    it('reports a product it cannot find', async () => {
      const handler = createBusinessHandler('inventory', gateway);

      const output = await handler(
        makeTaskInput('inventory', { text: 'check stock for lamps' }),
        makeExecutionContext('inventory'),
      );

      expect(output).toEqual({ status: 'not_found', product: 'lamps' });
    });
  });

  describe('accounting', () => {
    it('invoices the order a dependency created', async () => {
      const handler = createBusinessHandler('accounting', gateway);

      const output = await handler(
        makeTaskInput('accounting', { text: 'invoice for Acme' }, {
          dependencyOutputs: { sales: { status: 'created', orderId: 3 } },
        }),
        makeExecutionContext('accounting'),
      );

      expect(output).toEqual({ status: 'created', invoiceId: 1 });
      expect((await gateway.read('invoice', 1))?.values).toEqual({ customer: 'Acme', orderId: 3 });
    });
  });

  describe('hr', () => {
    it('lists every employee when the text names no one', async () => {
      const handler = createBusinessHandler('hr', gateway);

      const output = await handler(
        makeTaskInput('hr', { text: 'list employees' }),
        makeExecutionContext('hr'),
      );

      expect(output).toEqual({
        employees: [
          { id: 1, name: 'Ada Byron' },
          { id: 2, name: 'Grace Brewster' },
        ],
      });
    });

    it('filters employees by query', async () => {
      const handler = createBusinessHandler('hr', gateway);

      const output = await handler(
        makeTaskInput('hr', { action: 'search_employees', query: 'grace' }),
        makeExecutionContext('hr'),
      );

      expect(output).toEqual({ employees: [{ id: 2, name: 'Grace Brewster' }] });
    });
  });

  describe('custom', () => {
    it('echoes the task input', async () => {
      const output = await customHandler(
        makeTaskInput('custom', { anything: [1, 2] }),
        makeExecutionContext('custom'),
      );

      expect(output).toEqual({ status: 'custom_task_executed', data: { anything: [1, 2] } });
    });
  });
});
