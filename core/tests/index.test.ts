import { describe, expect, it } from 'vitest';
import {
  ChainError,
  DEFAULT_OUTPUT_KEY,
  LLMChainBuilder,
  MessageFormatter,
  MessageTemplate,
  OllamaClient,
  PromptTemplate,
  SimpleParser,
  isChainError,
} from '../src/index';
import type { Chain } from '../src/index';
import { MockLLM } from './mocks';

describe('public entry point', () => {
  it('builds and runs a chain through the exported API', async () => {
    const chain: Chain = new LLMChainBuilder()
      .prompt(new MessageFormatter([MessageTemplate.human('Mi nombre es: {nombre}')]))
      .llm(new MockLLM())
      .outputParser(new SimpleParser())
      .build();

    expect(chain.outputKeys()).toEqual([DEFAULT_OUTPUT_KEY]);
    expect(await chain.invoke({ nombre: 'luis' })).toBe('Mi nombre es: luis');
  });

  it('narrows chain errors by kind', async () => {
    const chain = new LLMChainBuilder()
      .prompt(PromptTemplate.fromTemplate('{question}'))
      .llm(new OllamaClient({ baseUrl: 'http://ollama.test', model: 'unused' }))
      .build();

    const error = await chain.invoke({}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ChainError);
    expect(isChainError(error, 'MissingInput')).toBe(true);
    expect(isChainError(error, 'Model')).toBe(false);
  });
});
