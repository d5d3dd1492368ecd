import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module.js';
import { PatternExtractorService } from './extraction/pattern-extractor.service.js';
import { AssistedExtractorService } from './extraction/assisted-extractor.service.js';
import { ExtractionCoordinatorService } from './extraction/extraction-coordinator.service.js';
import { CommitmentLedgerService } from './commitment/commitment-ledger.service.js';
import { SymbolicTaggerService } from './symbolic/symbolic-tagger.service.js';
import { MemoryStoreService } from './memory/memory-store.service.js';
import { ContextSynthesizerService } from './context/context-synthesizer.service.js';

const providers = [
  // extraction
  PatternExtractorService,
  AssistedExtractorService,
  ExtractionCoordinatorService,
  // state
  CommitmentLedgerService,
  SymbolicTaggerService,
  MemoryStoreService,
  // read side
  ContextSynthesizerService,
];

@Module({
  imports: [LlmModule],
  providers,
  exports: providers,
})
export class EngineModule {}
