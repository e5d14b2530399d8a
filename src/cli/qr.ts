import * as qrcode from 'qrcode-terminal';
import { describeError, type Logger } from '../logger';

/** Shows a ticket identifier to the customer. */
export type CodeRenderer = (data: string, print: (text: string) => void) => void;

export const plainRenderer: CodeRenderer = (data, print) => {
  print(data);
};

/** Terminal QR code followed by the identifier; plain text if rendering fails. */
export function qrRenderer(log: Logger): CodeRenderer {
  return (data, print) => {
    let rendered = '';
    try {
      qrcode.generate(data, { small: true }, code => {
        rendered = code;
      });
    } catch (err) {
      log({ level: 'warn', action: 'qr.error', error: describeError(err) });
    }
    if (rendered !== '') print(rendered);
    print(data);
  };
}
