import { container } from "tsyringe";
import config, { Config } from "../config/config";
import {
    conversationPhrases,
    ConversationPhrases,
    factSheet,
    FactSheet,
    retrievalRules,
    RetrievalRules,
    stopWords,
} from "../config/knowledge";
import { ContextRetrievalService } from "../business/services/ContextRetrievalService";
import { SynthesisTokenStore } from "../business/services/SynthesisTokenStore";
import { ICallLogRepository } from "../data/interfaces/ICallLogRepository";
import { CallLogRepository } from "../data/repositories/CallLogRepository";
import { ILeadLogRepository } from "../data/interfaces/ILeadLogRepository";
import { LeadLogRepository } from "../data/repositories/LeadLogRepository";

container.register<Config>("Config", { useValue: config });
container.register<RetrievalRules>("RetrievalRules", { useValue: retrievalRules });
container.register<FactSheet>("FactSheet", { useValue: factSheet });
container.register<ConversationPhrases>("ConversationPhrases", { useValue: conversationPhrases });
container.register<ReadonlySet<string>>("StopWords", { useValue: stopWords });

// Process-wide state: one index, one token store
container.registerSingleton(ContextRetrievalService, ContextRetrievalService);
container.registerSingleton(SynthesisTokenStore, SynthesisTokenStore);

// Both repositories serialize writes per instance
container.registerSingleton<ICallLogRepository>("ICallLogRepository", CallLogRepository);
container.registerSingleton<ILeadLogRepository>("ILeadLogRepository", LeadLogRepository);
