import { z } from 'zod';

const ItemId = z.number().int().positive();
const DayKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const Page = z.number().int().nonnegative().optional();

const UserCapture = {
  item_id: ItemId,
  date: DayKey,
};

const ManagerClient = {
  client_name: z.string().min(1),
  client_phone: z.string().min(1),
};

/**
 * One variant per step; each declares the scratch fields it needs. On disk the
 * scratch is stored as a flat key/value map next to the step name.
 */
export const ConversationStepSchema = z.discriminatedUnion('step', [
  z.object({ step: z.literal('main_menu') }),

  z.object({ step: z.literal('select_item'), page: Page }),
  z.object({ step: z.literal('waiting_date'), item_id: ItemId }),
  z.object({ step: z.literal('enter_name'), ...UserCapture }),
  z.object({ step: z.literal('phone_number'), ...UserCapture, user_name: z.string().min(1) }),
  z.object({
    step: z.literal('confirmation'),
    ...UserCapture,
    user_name: z.string().min(1),
    phone: z.string().min(1),
  }),

  z.object({ step: z.literal('manager_waiting_client_name'), is_manager_booking: z.literal(true) }),
  z.object({
    step: z.literal('manager_waiting_client_phone'),
    is_manager_booking: z.literal(true),
    client_name: z.string().min(1),
  }),
  z.object({
    step: z.literal('manager_waiting_item_selection'),
    is_manager_booking: z.literal(true),
    ...ManagerClient,
    page: Page,
  }),
  z.object({
    step: z.literal('manager_waiting_date_type'),
    is_manager_booking: z.literal(true),
    ...ManagerClient,
    item_id: ItemId,
  }),
  z.object({
    step: z.literal('manager_waiting_single_date'),
    is_manager_booking: z.literal(true),
    ...ManagerClient,
    item_id: ItemId,
    date_type: z.literal('single'),
  }),
  z.object({
    step: z.literal('manager_waiting_start_date'),
    is_manager_booking: z.literal(true),
    ...ManagerClient,
    item_id: ItemId,
    date_type: z.literal('range'),
  }),
  z.object({
    step: z.literal('manager_waiting_end_date'),
    is_manager_booking: z.literal(true),
    ...ManagerClient,
    item_id: ItemId,
    date_type: z.literal('range'),
    start_date: DayKey,
  }),
  z.object({
    step: z.literal('manager_waiting_comment'),
    is_manager_booking: z.literal(true),
    ...ManagerClient,
    item_id: ItemId,
    date_type: z.enum(['single', 'range']),
    dates: z.array(DayKey).min(1),
  }),
  z.object({
    step: z.literal('manager_confirm_booking'),
    is_manager_booking: z.literal(true),
    ...ManagerClient,
    item_id: ItemId,
    date_type: z.enum(['single', 'range']),
    dates: z.array(DayKey).min(1),
    comment: z.string(),
  }),

  z.object({ step: z.literal('schedule_select_item'), page: Page }),
  z.object({ step: z.literal('view_schedule'), item_id: ItemId }),
  z.object({ step: z.literal('waiting_specific_date'), item_id: ItemId }),
]);

export type ConversationStep = z.infer<typeof ConversationStepSchema>;
export type StepName = ConversationStep['step'];
export type StepOf<N extends StepName> = Extract<ConversationStep, { step: N }>;

export const MAIN_MENU: ConversationStep = { step: 'main_menu' };

/** The step immediately preceding `current`, keeping the scratch it still needs. */
export function previousStep(current: ConversationStep): ConversationStep {
  switch (current.step) {
    case 'main_menu':
    case 'select_item':
    case 'manager_waiting_client_name':
    case 'schedule_select_item':
      return MAIN_MENU;
    case 'waiting_date':
      return { step: 'select_item' };
    case 'enter_name':
      return { step: 'waiting_date', item_id: current.item_id };
    case 'phone_number':
      return { step: 'enter_name', item_id: current.item_id, date: current.date };
    case 'confirmation':
      return { step: 'phone_number', item_id: current.item_id, date: current.date, user_name: current.user_name };
    case 'manager_waiting_client_phone':
      return { step: 'manager_waiting_client_name', is_manager_booking: true };
    case 'manager_waiting_item_selection':
      return { step: 'manager_waiting_client_phone', is_manager_booking: true, client_name: current.client_name };
    case 'manager_waiting_date_type': {
      const { client_name, client_phone } = current;
      return { step: 'manager_waiting_item_selection', is_manager_booking: true, client_name, client_phone };
    }
    case 'manager_waiting_single_date':
    case 'manager_waiting_start_date': {
      const { client_name, client_phone, item_id } = current;
      return { step: 'manager_waiting_date_type', is_manager_booking: true, client_name, client_phone, item_id };
    }
    case 'manager_waiting_end_date': {
      const { client_name, client_phone, item_id } = current;
      return {
        step: 'manager_waiting_start_date',
        is_manager_booking: true,
        client_name,
        client_phone,
        item_id,
        date_type: 'range',
      };
    }
    case 'manager_waiting_comment': {
      const { client_name, client_phone, item_id } = current;
      const base = { is_manager_booking: true as const, client_name, client_phone, item_id };
      if (current.date_type === 'single') {
        return { step: 'manager_waiting_single_date', ...base, date_type: 'single' };
      }
      return { step: 'manager_waiting_end_date', ...base, date_type: 'range', start_date: current.dates[0] ?? '' };
    }
    case 'manager_confirm_booking': {
      const { comment: _comment, ...rest } = current;
      return { ...rest, step: 'manager_waiting_comment' };
    }
    case 'view_schedule':
      return { step: 'schedule_select_item' };
    case 'waiting_specific_date':
      return { step: 'view_schedule', item_id: current.item_id };
  }
}
