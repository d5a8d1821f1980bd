/**
 * Model Extraction Tests
 *
 * The OpenAI SDK is mocked; no request leaves the process.
 */

import {
  createOpenAIModelClient,
  decodeModelOutput,
  extractWithModel,
  parseModelReply,
  MEDICAL_FIELDS_TEMPLATE,
  type ModelClient,
  type ModelPrompt,
  type Page,
} from '@medparse/shared';

const mockCreate = jest.fn();
const mockOpenAIConstructor = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation((options: unknown) => {
    mockOpenAIConstructor(options);
    return { chat: { completions: { create: mockCreate } } };
  }),
}));

const PAGES: Page[] = [{ page: 1, text: 'Patient Name: Jane Doe DOB: 02/14/1980' }];

const VALID_REPLY = JSON.stringify({
  doctor_name: 'Dr. Alice Smith',
  patient_name: 'Jane Doe',
  dob: '1980-02-14',
  confidence: { doctor: 0.9, patient: 0.95, dob: 0.9 },
  evidence: ['PAGE:1:Patient Name: Jane Doe'],
});

/**
 * In-process model client returning a canned reply
 */
function fakeClient(reply: string | Error): ModelClient & { prompts: ModelPrompt[] } {
  const prompts: ModelPrompt[] = [];
  return {
    model: 'test-model',
    prompts,
    async complete(prompt: ModelPrompt): Promise<string> {
      prompts.push(prompt);
      if (reply instanceof Error) {
        throw reply;
      }
      return reply;
    },
  };
}

describe('parseModelReply', () => {
  it('should parse a plain JSON object', () => {
    expect(parseModelReply('{"patient_name":"Jane Doe"}')).toEqual({ patient_name: 'Jane Doe' });
  });

  it('should recover the object from a fenced reply', () => {
    const reply = 'Here is the result:\n```json\n{"dob":"1980-02-14"}\n```';
    expect(parseModelReply(reply)).toEqual({ dob: '1980-02-14' });
  });

  it.each([
    ['prose without braces', 'I could not find any fields.'],
    ['an unparseable brace span', 'result: {doctor_name: Smith}'],
    ['a JSON array', '[{"patient_name":"Jane Doe"}]'],
    ['a JSON string', '"Jane Doe"'],
    ['an empty object', '{}'],
    ['an empty reply', ''],
  ])('should return null for %s', (_label, reply) => {
    expect(parseModelReply(reply)).toBeNull();
  });
});

describe('decodeModelOutput', () => {
  it('should decode a complete object', () => {
    expect(decodeModelOutput(JSON.parse(VALID_REPLY))).toEqual({
      doctor_name: 'Dr. Alice Smith',
      patient_name: 'Jane Doe',
      dob: '1980-02-14',
      confidence: { doctor: 0.9, patient: 0.95, dob: 0.9 },
      evidence: ['PAGE:1:Patient Name: Jane Doe'],
    });
  });

  it('should default absent and malformed keys', () => {
    expect(
      decodeModelOutput({
        doctor_name: null,
        patient_name: 42,
        confidence: { doctor: 'high', patient: 'NaN' },
        evidence: 'PAGE:1:text',
      })
    ).toEqual({
      doctor_name: '',
      patient_name: '',
      dob: '',
      confidence: { doctor: 0, patient: 0, dob: 0 },
      evidence: [],
    });
  });

  it('should trim strings, clamp scores and keep only string evidence', () => {
    expect(
      decodeModelOutput({
        doctor_name: '  Dr. Alice Smith ',
        patient_name: 'Jane Doe',
        dob: ' 02/14/1980 ',
        confidence: { doctor: 1.4, patient: -0.2, dob: '0.8' },
        evidence: ['PAGE:1:DOB', 7, null, 'PAGE:2:Dr. Smith'],
      })
    ).toEqual({
      doctor_name: 'Dr. Alice Smith',
      patient_name: 'Jane Doe',
      dob: '02/14/1980',
      confidence: { doctor: 1, patient: 0, dob: 0.8 },
      evidence: ['PAGE:1:DOB', 'PAGE:2:Dr. Smith'],
    });
  });
});

describe('extractWithModel', () => {
  it('should send the built prompt and decode the reply', async () => {
    const client = fakeClient(VALID_REPLY);
    const result = await extractWithModel(PAGES, client);

    expect(client.prompts).toHaveLength(1);
    expect(client.prompts[0].system).toBe(MEDICAL_FIELDS_TEMPLATE.systemPrompt);
    expect(client.prompts[0].user).toContain('===PAGE:1===\nPatient Name: Jane Doe DOB: 02/14/1980\n');
    expect(result?.patient_name).toBe('Jane Doe');
    expect(result?.confidence.patient).toBe(0.95);
  });

  it('should apply the prompt budget', async () => {
    const client = fakeClient(VALID_REPLY);
    await extractWithModel([{ page: 1, text: 'x'.repeat(100) }], client, { maxChars: 50 });

    expect(client.prompts[0].user).toContain(`===PAGE:1===\n${'x'.repeat(37)}...[truncated]\n`);
  });

  it('should return null when the endpoint fails', async () => {
    const client = fakeClient(new Error('connect ECONNREFUSED 127.0.0.1:11434'));
    await expect(extractWithModel(PAGES, client)).resolves.toBeNull();
  });

  it('should return null when the reply is not usable', async () => {
    await expect(extractWithModel(PAGES, fakeClient('not json'))).resolves.toBeNull();
    await expect(extractWithModel(PAGES, fakeClient('{}'))).resolves.toBeNull();
  });
});

describe('createOpenAIModelClient', () => {
  const config = {
    llmBaseUrl: 'http://localhost:11434/v1',
    llmModel: 'gemma3',
    llmRequestTimeoutMs: 1500,
  };
  const prompt: ModelPrompt = { system: 'system text', user: 'user text' };

  beforeEach(() => {
    mockCreate.mockReset();
    mockOpenAIConstructor.mockReset();
  });

  it('should configure the SDK without retries', () => {
    createOpenAIModelClient(config);

    expect(mockOpenAIConstructor).toHaveBeenCalledWith({
      apiKey: 'ollama',
      baseURL: 'http://localhost:11434/v1',
      timeout: 1500,
      maxRetries: 0,
    });
  });

  it('should request a non-streaming JSON completion', async () => {
    mockCreate.mockResolvedValue({
      id: 'chatcmpl-1',
      choices: [{ message: { content: '{"patient_name":"Jane Doe"}' } }],
    });

    const client = createOpenAIModelClient(config);
    await expect(client.complete(prompt)).resolves.toBe('{"patient_name":"Jane Doe"}');

    expect(client.model).toBe('gemma3');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gemma3',
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: 'user text' },
      ],
      stream: false,
      response_format: { type: 'json_object' },
      temperature: 0,
    });
  });

  it('should return an empty string when the reply has no content', async () => {
    mockCreate.mockResolvedValue({ id: 'chatcmpl-2', choices: [] });
    await expect(createOpenAIModelClient(config).complete(prompt)).resolves.toBe('');
  });

  it('should reject when the SDK call fails', async () => {
    mockCreate.mockRejectedValue(new Error('Request timed out.'));
    await expect(createOpenAIModelClient(config).complete(prompt)).rejects.toThrow('Request timed out.');
  });
});
