import { execFile } from 'node:child_process';
import { platform } from 'node:os';
import { promisify } from 'node:util';
import { SendFailureError, describeError } from '../../errors.js';
import { DeliveryPrimitive } from '../channel.js';

const execFileAsync = promisify(execFile);

// Recipient and text travel as argv so no quoting of user content is needed.
const SEND_SCRIPT = `
on run argv
  set targetHandle to item 1 of argv
  set messageText to item 2 of argv
  tell application "Messages"
    set targetService to 1st account whose service type = iMessage
    set targetBuddy to participant targetHandle of targetService
    send messageText to targetBuddy
  end tell
end run
`;

/** Sends through Messages.app with osascript. macOS only. */
export class IMessageSender implements DeliveryPrimitive {
  public readonly name = 'imessage';

  constructor(private readonly timeoutMs: number = 15_000) {}

  async deliver(peer: string, text: string): Promise<void> {
    if (platform() !== 'darwin') {
      throw new SendFailureError(peer, 'iMessage is only available on macOS');
    }

    try {
      await execFileAsync('osascript', ['-e', SEND_SCRIPT, peer, text], {
        timeout: this.timeoutMs,
      });
    } catch (err) {
      throw new SendFailureError(peer, `osascript failed: ${describeError(err)}`, { cause: err });
    }
  }
}
