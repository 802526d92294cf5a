import { Module } from '@nestjs/common';
import { ScopeRegistry } from './scope-registry';
import { ScopeEvaluatorService } from './scope-evaluator.service';

@Module({
  providers: [ScopeRegistry, ScopeEvaluatorService],
  exports: [ScopeRegistry, ScopeEvaluatorService],
})
export class ScopesModule {}
