export const PROMPT_TEXT = '👇 Do you want to replace your registered tariffs with the new ones?';
export const CONFIRMED_TEXT = '✅ Tariffs updated!';
export const DECLINED_TEXT = '🔧 You can update your tariffs at any time with /update.';
export const NOTHING_PENDING_TEXT = 'ℹ️ There is nothing left to update. Use /update to change your tariffs.';
export const OUTDATED_TEXT =
  'ℹ️ Your tariffs changed since this offer was sent, so nothing was updated. Use /update to review them.';
export const UPDATE_FAILED_TEXT = '❌ The update could not be saved. Please press the button again in a moment.';

export const ACCEPT_BUTTON_TEXT = '✅ Update tariffs';
export const DECLINE_BUTTON_TEXT = '❌ No thanks';
