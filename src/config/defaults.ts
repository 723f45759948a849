/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and for every field a user's
 * config.toml leaves out. The loader merges user config ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are an assistant that answers questions using only the knowledge base ' +
  'context you are given. If the context does not contain the answer, say so ' +
  'plainly instead of guessing. Cite the bracketed source labels you relied on.';

export const DEFAULT_USER_PROMPT_TEMPLATE = `Context from the knowledge base:
{context}

Question: {query}

Answer using the context above.`;

export const DEFAULT_CONFIG: Config = {
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small', // 1536 dimensions
    dimensions: 1536,
    batch_size: 100,
    timeout_ms: 60000,
    // Illustrative list prices; override in config.toml when they change
    pricing: {
      'text-embedding-3-small': 0.00002,
      'text-embedding-3-large': 0.00013,
      'text-embedding-ada-002': 0.0001,
    },
    default_price_per_1k: 0.0001,
  },

  chunking: {
    max_tokens_per_chunk: 8000,
    overlap_tokens: 200,
  },

  search: {
    default_top_k: 3,
    max_context_length: 1000,
  },

  generation: {
    chat_model: 'gpt-4o',
    temperature: 0.2,
    max_tokens: 1000,
    timeout_ms: 60000,
    system_prompt: DEFAULT_SYSTEM_PROMPT,
    user_prompt_template: DEFAULT_USER_PROMPT_TEMPLATE,
  },

  storage: {
    busy_timeout_ms: 5000,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.docqa/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# docqa configuration
# Location: ~/.docqa/config.toml (or $DOCQA_HOME/config.toml)

[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
default_price_per_1k = ${DEFAULT_CONFIG.embedding.default_price_per_1k}

# USD per 1K tokens; unknown models use default_price_per_1k
[embedding.pricing]
# "text-embedding-3-small" = 0.00002

[chunking]
max_tokens_per_chunk = ${DEFAULT_CONFIG.chunking.max_tokens_per_chunk}
overlap_tokens = ${DEFAULT_CONFIG.chunking.overlap_tokens}  # must stay below max_tokens_per_chunk

[search]
default_top_k = ${DEFAULT_CONFIG.search.default_top_k}
max_context_length = ${DEFAULT_CONFIG.search.max_context_length}  # characters per chunk

[generation]
chat_model = "${DEFAULT_CONFIG.generation.chat_model}"
temperature = ${DEFAULT_CONFIG.generation.temperature}
max_tokens = ${DEFAULT_CONFIG.generation.max_tokens}
timeout_ms = ${DEFAULT_CONFIG.generation.timeout_ms}
# Prompts can also come from DOCQA_SYSTEM_PROMPT / DOCQA_USER_PROMPT_TEMPLATE.
# The user template must contain both {context} and {query}.
# system_prompt = "..."
# user_prompt_template = "..."

[storage]
busy_timeout_ms = ${DEFAULT_CONFIG.storage.busy_timeout_ms}
`;
