import { ToolResult, failure, success } from '../../models/toolResult';
import { Notifier } from '../sms';
import { LogContext, errorMessage, logger } from '../../utils/logger';

export async function sendEscalateMessage(
  notifier: Notifier,
  receiverNumber: string,
  messageText: unknown,
  ctx: LogContext = {},
): Promise<ToolResult> {
  if (typeof messageText !== 'string' || messageText.trim() === '') {
    return failure('INVALID_INPUT', 'message_text is required.', { received: messageText ?? null });
  }
  if (!receiverNumber.trim()) {
    return failure('PRECONDITION_FAILED', 'No escalation contact is set up for this session.');
  }

  try {
    const { sid } = await notifier.send(receiverNumber, messageText.trim());
    logger.info('Escalation SMS sent', ctx, { sid, preview: messageText.slice(0, 60) });
    return success('Escalation SMS sent.', { sid });
  } catch (err) {
    logger.error('Escalation SMS failed', ctx, { error: errorMessage(err) });
    return failure('SEND_FAILED', "I couldn't reach a team member right now. Please try again shortly.", {
      error: errorMessage(err),
    });
  }
}
