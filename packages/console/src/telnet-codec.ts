export const IAC = 255;
export const DONT = 254;
export const DO = 253;
export const WONT = 252;
export const WILL = 251;
export const SB = 250;
export const SE = 240;

export const OPT_ECHO = 1;
export const OPT_SGA = 3;

// Options the remote side may enable / options we enable ourselves
const ACCEPTED_REMOTE = new Set([OPT_ECHO, OPT_SGA]);
const ACCEPTED_LOCAL = new Set([OPT_SGA]);

type DecoderState = 'data' | 'iac' | 'option' | 'sb' | 'sb-iac';

export interface DecodedChunk {
  data: Buffer;
  replies: Buffer;
}

/**
 * Strips telnet command sequences from the inbound stream and produces the
 * negotiation replies to send back. State carries over between chunks, so a
 * sequence split across two TCP reads is still recognised.
 */
export class TelnetDecoder {
  private state: DecoderState = 'data';
  private verb = 0;
  private answered = new Set<number>();

  push(chunk: Buffer): DecodedChunk {
    const data: number[] = [];
    const replies: number[] = [];

    for (const byte of chunk) {
      switch (this.state) {
        case 'data':
          if (byte === IAC) {
            this.state = 'iac';
          } else {
            data.push(byte);
          }
          break;

        case 'iac':
          if (byte === IAC) {
            data.push(IAC);
            this.state = 'data';
          } else if (byte >= WILL && byte <= DONT) {
            this.verb = byte;
            this.state = 'option';
          } else if (byte === SB) {
            this.state = 'sb';
          } else {
            // NOP, GA, AYT and friends carry no payload
            this.state = 'data';
          }
          break;

        case 'option':
          replies.push(...this.answer(this.verb, byte));
          this.state = 'data';
          break;

        case 'sb':
          if (byte === IAC) this.state = 'sb-iac';
          break;

        case 'sb-iac':
          this.state = byte === SE ? 'data' : 'sb';
          break;
      }
    }

    return { data: Buffer.from(data), replies: Buffer.from(replies) };
  }

  private answer(verb: number, option: number): number[] {
    const key = verb * 256 + option;
    if (this.answered.has(key)) return [];
    this.answered.add(key);

    switch (verb) {
      case WILL:
        return [IAC, ACCEPTED_REMOTE.has(option) ? DO : DONT, option];
      case DO:
        return [IAC, ACCEPTED_LOCAL.has(option) ? WILL : WONT, option];
      default:
        // WONT / DONT: nothing was enabled that needs acknowledging
        return [];
    }
  }
}
