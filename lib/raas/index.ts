export {
  KnowledgeBaseManager,
  KNOWLEDGE_BASE_DEFAULTS,
  type KnowledgeBaseInput,
  type KnowledgeBaseManagerOptions,
} from "./manager";
