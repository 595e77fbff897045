import { describe, it, expect, vi, afterEach } from 'vitest';

const validateRequest = vi.hoisted(() => vi.fn());
vi.mock('twilio', () => ({ default: { validateRequest } }));

import {
  buildMarkMessage,
  buildMediaMessage,
  escapeXml,
  parseMediaMessage,
  parseWebhookParams,
} from '../providers/TwilioProvider';
import { TEST_PROMPTS, makeTwilio } from './helpers/fakes';

const XML_HEADER = '<?xml version="1.0" encoding="UTF-8"?>';
const ACTION = 'https://voice.example.test/webhook/voice/speech';
const GATHER_ATTRS = `input="speech" action="${ACTION}" method="POST" speechTimeout="auto" timeout="5" language="en-US"`;
const REDIRECT = `<Redirect method="POST">${ACTION}</Redirect>`;

function say(text: string): string {
  return `<Say voice="Polly.Joanna" language="en-US">${text}</Say>`;
}

function doc(...verbs: string[]): string {
  return `${XML_HEADER}\n<Response>\n${verbs.map((verb) => `  ${verb}\n`).join('')}</Response>`;
}

describe('TwilioProvider', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    validateRequest.mockReset();
  });

  describe('TwiML', () => {
    it('greets, opens the media stream and gathers speech', () => {
      expect(makeTwilio().greetingTwiml()).toBe(
        doc(
          '<Start><Stream url="wss://voice.example.test/media-stream" /></Start>',
          `<Gather ${GATHER_ATTRS}>${say('Hello! How can I help you today?')}</Gather>`,
          REDIRECT
        )
      );
    });

    it('holds with a pause and a silent gather', () => {
      expect(makeTwilio().holdTwiml()).toBe(doc('<Pause length="1" />', `<Gather ${GATHER_ATTRS} />`, REDIRECT));
    });

    it('includes the re-prompt inside the gather when configured', () => {
      const twilio = makeTwilio({ ...TEST_PROMPTS, reprompt: 'Anything else?' });
      expect(twilio.repromptTwiml()).toBe(doc(`<Gather ${GATHER_ATTRS}>${say('Anything else?')}</Gather>`, REDIRECT));
    });

    it('apologizes and keeps listening', () => {
      expect(makeTwilio().emptyResultTwiml()).toBe(
        doc(say('Sorry, I didn&apos;t catch that.'), `<Gather ${GATHER_ATTRS} />`, REDIRECT)
      );
    });

    it('says farewell and hangs up', () => {
      expect(makeTwilio().farewellTwiml()).toBe(doc(say('Okay, goodbye!'), '<Hangup />'));
      expect(makeTwilio().hangupTwiml()).toBe(doc('<Hangup />'));
    });

    it('renders an empty response', () => {
      expect(makeTwilio().emptyTwiml()).toBe(`${XML_HEADER}\n<Response>\n</Response>`);
    });

    it('escapes XML special characters', () => {
      expect(escapeXml(`Tom & "Jerry" <b>'s`)).toBe('Tom &amp; &quot;Jerry&quot; &lt;b&gt;&apos;s');
      expect(makeTwilio().farewellTwiml('A < B')).toBe(doc(say('A &lt; B'), '<Hangup />'));
    });
  });

  describe('parseWebhookParams', () => {
    it('maps form fields to typed params', () => {
      const params = parseWebhookParams(
        'CallSid=CA-1&AccountSid=AC-test&From=%2B15550001111&To=%2B15550002222&CallStatus=in-progress' +
          '&Direction=inbound&SpeechResult=What+time+is+it%3F&Confidence=0.92'
      );

      expect(params).toEqual({
        callSid: 'CA-1',
        accountSid: 'AC-test',
        from: '+15550001111',
        to: '+15550002222',
        callStatus: 'in-progress',
        direction: 'inbound',
        speechResult: 'What time is it?',
        confidence: 0.92,
        raw: {
          CallSid: 'CA-1',
          AccountSid: 'AC-test',
          From: '+15550001111',
          To: '+15550002222',
          CallStatus: 'in-progress',
          Direction: 'inbound',
          SpeechResult: 'What time is it?',
          Confidence: '0.92',
        },
      });
    });

    it('defaults missing fields', () => {
      const params = parseWebhookParams('CallSid=CA-2&Confidence=abc');
      expect(params.speechResult).toBe('');
      expect(params.from).toBe('');
      expect(params.confidence).toBeNull();
    });
  });

  describe('parseMediaMessage', () => {
    it('parses a start event', () => {
      const message = parseMediaMessage(
        JSON.stringify({
          event: 'start',
          sequenceNumber: '1',
          streamSid: 'MZ-1',
          start: {
            streamSid: 'MZ-1',
            accountSid: 'AC-test',
            callSid: 'CA-1',
            tracks: ['inbound', 7],
            mediaFormat: { encoding: 'audio/x-mulaw', sampleRate: 8000, channels: 1 },
            customParameters: { lang: 'en', retries: 3 },
          },
        })
      );

      expect(message).toEqual({
        event: 'start',
        sequenceNumber: '1',
        streamSid: 'MZ-1',
        start: {
          streamSid: 'MZ-1',
          accountSid: 'AC-test',
          callSid: 'CA-1',
          tracks: ['inbound'],
          mediaFormat: { encoding: 'audio/x-mulaw', sampleRate: 8000, channels: 1 },
          customParameters: { lang: 'en' },
        },
      });
    });

    it('parses media, mark, stop and connected events', () => {
      expect(parseMediaMessage('{"event":"connected","protocol":"Call","version":"1.0.0"}')).toEqual({
        event: 'connected',
        protocol: 'Call',
        version: '1.0.0',
      });
      expect(parseMediaMessage('{"event":"media","streamSid":"MZ-1","media":{"payload":"AAAA"}}')).toEqual({
        event: 'media',
        sequenceNumber: '',
        streamSid: 'MZ-1',
        media: { track: 'inbound', chunk: '', timestamp: '', payload: 'AAAA' },
      });
      expect(parseMediaMessage(Buffer.from('{"event":"mark","streamSid":"MZ-1","mark":{"name":"s1"}}'))).toEqual({
        event: 'mark',
        sequenceNumber: '',
        streamSid: 'MZ-1',
        mark: { name: 's1' },
      });
      expect(parseMediaMessage('{"event":"stop","streamSid":"MZ-1"}')).toEqual({
        event: 'stop',
        sequenceNumber: '',
        streamSid: 'MZ-1',
        stop: { accountSid: '', callSid: '' },
      });
    });

    it('rejects malformed messages', () => {
      expect(parseMediaMessage('{oops')).toBeNull();
      expect(parseMediaMessage('[1,2]')).toBeNull();
      expect(parseMediaMessage('{"event":"dtmf"}')).toBeNull();
      expect(parseMediaMessage('{"event":"media","media":{}}')).toBeNull();
      expect(parseMediaMessage('{"event":"mark","mark":{"name":5}}')).toBeNull();
      expect(parseMediaMessage('{"event":"start","start":{"streamSid":"MZ-1"}}')).toBeNull();
    });
  });

  describe('outbound envelopes', () => {
    it('encodes media frames as base64', () => {
      expect(JSON.parse(buildMediaMessage('MZ-1', Buffer.from([0xff, 0x7f, 0x00])))).toEqual({
        event: 'media',
        streamSid: 'MZ-1',
        media: { payload: '/38A' },
      });
    });

    it('builds mark messages', () => {
      expect(JSON.parse(buildMarkMessage('MZ-1', 'done'))).toEqual({
        event: 'mark',
        streamSid: 'MZ-1',
        mark: { name: 'done' },
      });
    });
  });

  describe('validateSignature', () => {
    it('delegates to the Twilio helper with the auth token', () => {
      validateRequest.mockReturnValue(true);
      const params = { CallSid: 'CA-1' };

      expect(makeTwilio().validateSignature('sig', 'https://voice.example.test/webhook/voice', params)).toBe(true);
      expect(validateRequest).toHaveBeenCalledWith(
        'test-secret',
        'sig',
        'https://voice.example.test/webhook/voice',
        params
      );
    });

    it('rejects a missing signature without calling the helper', () => {
      expect(makeTwilio().validateSignature(undefined, 'https://voice.example.test/webhook/voice', {})).toBe(false);
      expect(validateRequest).not.toHaveBeenCalled();
    });
  });

  describe('endCall', () => {
    it('posts Status=completed to the call resource', async () => {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValue(new Response(JSON.stringify({ sid: 'CA-1', status: 'completed' }), { status: 200 }));

      await makeTwilio().endCall('CA-1');

      expect(fetchSpy).toHaveBeenCalledTimes(1);
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('https://api.twilio.com/2010-04-01/Accounts/AC-test/Calls/CA-1.json');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('Status=completed');
      expect(init?.headers).toEqual({
        Authorization: `Basic ${Buffer.from('AC-test:test-secret').toString('base64')}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      });
    });

    it('throws on API errors', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('not found', { status: 404 }));
      await expect(makeTwilio().endCall('CA-404')).rejects.toThrow('Twilio API error: 404 - not found');
    });
  });
});
