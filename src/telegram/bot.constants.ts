export const MENU_WALLET_CALLBACK = 'menu_wallet';
export const MENU_STATUS_CALLBACK = 'menu_status';
export const MENU_HELP_CALLBACK = 'menu_help';
export const MENU_BACK_CALLBACK = 'menu_back';
export const HELP_TOPIC_CALLBACK_PREFIX = 'help_topic:';

export const WALLET_ADDRESS_LISTENER_KIND = 'wallet_address';
export const EXPORT_COOLDOWN_MS = 30_000;
export const EXPORT_MIME_TYPE = 'application/json';

export enum HelpTopic {
  GUARD = 'guard',
  LISTENERS = 'listeners',
  COMMANDS = 'commands',
}
