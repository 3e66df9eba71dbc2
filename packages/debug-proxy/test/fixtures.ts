import { CodeClassifier } from '../src/classify/codeClassifier';
import { LanguageProfile } from '../src/config/languageProfile';
import { WireMessage } from '../src/framing/messageFramer';
import { encodeFrame } from '../src/framing/wireFormat';
import { ProtocolDialect } from '../src/protocol/dialect';
import { ResponseEnvelope } from '../src/protocol/envelopes';

export const WORKSPACE = '/work/orders';
export const USER_FILE = `${WORKSPACE}/workflow.go`;
export const ACTIVITY_FILE = `${WORKSPACE}/activities/charge.go`;
export const ADAPTER_FILE = `${WORKSPACE}/replayer-adapter/replayer.go`;
export const SDK_FILE = '/home/dev/go/pkg/mod/go.temporal.io/sdk@v1.25.0/internal/workflow.go';

export const TEST_PROFILE: LanguageProfile = {
  language: 'go',
  adapterPathPatterns: ['replayer-adapter/', 'go.temporal.io/sdk@'],
  userCodeExclusions: ['replayer-adapter/', 'vendor/', 'go.temporal.io/sdk@'],
  functionHints: [
    {
      fileSuffix: 'replayer-adapter/replayer.go',
      fromLine: 100,
      toLine: 110,
      functionName: 'replayer_adapter.notifyRunner',
    },
  ],
};

export function testClassifier(profile: LanguageProfile = TEST_PROFILE): CodeClassifier {
  return new CodeClassifier(profile, () => WORKSPACE);
}

export function bareMessage(text: string, prefix = ''): WireMessage {
  const raw = Buffer.from(text, 'utf8');
  return { format: 'bare', prefix: Buffer.from(prefix, 'utf8'), raw, body: raw };
}

export function framedMessage(text: string): WireMessage {
  return {
    format: 'framed',
    prefix: Buffer.alloc(0),
    raw: encodeFrame('framed', text),
    body: Buffer.from(text, 'utf8'),
  };
}

export function messageFor(dialect: ProtocolDialect, text: string): WireMessage {
  return dialect.format === 'framed' ? framedMessage(text) : bareMessage(text);
}

export function decodeResponse(dialect: ProtocolDialect, text: string): ResponseEnvelope {
  const envelope = dialect.decode(messageFor(dialect, text));
  if (!envelope || envelope.kind !== 'response') {
    throw new Error(`Not a response: ${text}`);
  }
  return envelope;
}

/** A Delve `DebuggerState` stopped at `file:line`. */
export function delveState(file: string, line: number, functionName = 'main.Workflow'): string {
  return `{"Running":false,"currentThread":{"id":1,"pc":18446744073709551615,"file":"${file}","line":${line},"function":{"name":"${functionName}"}},"exited":false}`;
}

export function delveLocation(file: string, line: number, functionName = 'main.Workflow'): string {
  return `{"pc":4198400,"file":"${file}","line":${line},"function":{"name":"${functionName}"}}`;
}

export function dapFrame(id: number, file: string, line: number, name = 'main.Workflow'): string {
  return `{"id":${id},"name":"${name}","source":{"path":"${file}"},"line":${line},"column":1}`;
}

/** Splits a Content-Length framed write back into its JSON body. */
export function framedBody(bytes: Buffer): string {
  const text = bytes.toString('utf8');
  const separator = text.indexOf('\r\n\r\n');
  return separator === -1 ? text : text.slice(separator + 4);
}
