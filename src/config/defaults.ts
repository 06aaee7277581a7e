/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults, and
 * environment variables on top of that (see settings.ts).
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 * Points at the three backends on localhost
 */
export const DEFAULT_CONFIG: Config = {
  backends: {
    retrieval_url: 'http://localhost:8080',
    assistant_url: 'http://localhost:8081',
    generation_url: 'http://localhost:11434',
    timeout_ms: 60000,
    generation_timeout_ms: 120000,
  },

  // manager/study omitted - they follow chat
  models: {
    chat: 'llama3.1',
  },

  query: {
    default_top_k: 8,
    max_top_k: 50,
    default_mode: 'assisted',
  },

  manager: {
    max_steps: 4,
  },

  generation: {
    context_window: 4096,
    max_context_chars: 12000,
  },

  export: {
    output_dir: '~/.workspace-agent/study_guides',
    public_base_path: '/guides',
    pdf: true,
    slug_max_length: 80,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.workspace-agent/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Workspace Agent Configuration
# Location: ~/.workspace-agent/config.toml
# Environment variables (see .env.example) override these values.

# Backend services
[backends]
retrieval_url = "${DEFAULT_CONFIG.backends.retrieval_url}"    # POST /query
assistant_url = "${DEFAULT_CONFIG.backends.assistant_url}"    # POST /chat
generation_url = "${DEFAULT_CONFIG.backends.generation_url}"  # Ollama
timeout_ms = ${DEFAULT_CONFIG.backends.timeout_ms}
generation_timeout_ms = ${DEFAULT_CONFIG.backends.generation_timeout_ms}

# Models (manager and study default to chat)
[models]
chat = "${DEFAULT_CONFIG.models.chat}"
# manager = "llama3.1"
# study = "llama3.1"

[query]
default_top_k = ${DEFAULT_CONFIG.query.default_top_k}
max_top_k = ${DEFAULT_CONFIG.query.max_top_k}
default_mode = "${DEFAULT_CONFIG.query.default_mode}"   # rag_only | assisted | manager_auto | study_guide

[manager]
max_steps = ${DEFAULT_CONFIG.manager.max_steps}

[generation]
context_window = ${DEFAULT_CONFIG.generation.context_window}
max_context_chars = ${DEFAULT_CONFIG.generation.max_context_chars}

# Study guide export
[export]
output_dir = "${DEFAULT_CONFIG.export.output_dir}"
public_base_path = "${DEFAULT_CONFIG.export.public_base_path}"
pdf = ${DEFAULT_CONFIG.export.pdf}
slug_max_length = ${DEFAULT_CONFIG.export.slug_max_length}
`;
