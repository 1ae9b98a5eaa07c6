import * as p from '@clack/prompts';
import type { AppConfig } from '../../../config/index.js';

/**
 * Asks for whichever half of the tag is missing. Returns null when the user
 * cancels.
 */
export async function promptForTag(
  config: AppConfig
): Promise<{ key: string; value: string } | null> {
  const key = config.tagKey
    ? config.tagKey
    : await p.text({
        message: 'Tag key shared by the resources to chart:',
        placeholder: 'Environment',
        validate: value => (value.trim() ? undefined : 'Tag key is required'),
      });

  if (p.isCancel(key)) {
    return null;
  }

  const value = config.tagValue
    ? config.tagValue
    : await p.text({
        message: `Value of ${key}:`,
        placeholder: 'prod',
        validate: input => (input.trim() ? undefined : 'Tag value is required'),
      });

  if (p.isCancel(value)) {
    return null;
  }

  return { key: key.trim(), value: value.trim() };
}
