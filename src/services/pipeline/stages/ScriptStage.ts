import { ValidationError } from '../../../errors/index.js';
import { ScriptWriter } from '../../script/ExcerptScriptWriter.js';
import { PipelineStage, ScriptArtifact, StageContext } from '../types.js';

export class ScriptStage implements PipelineStage<ScriptArtifact> {
  readonly name = 'script';
  readonly mode = 'sync';

  constructor(private readonly writer: ScriptWriter) {}

  async execute(context: StageContext): Promise<ScriptArtifact> {
    const text = await this.writer.write(context.item, context.signal);
    if (!text.trim()) {
      throw new ValidationError(`Item ${context.item.id} produced an empty script`, {
        service: 'ScriptStage',
        operation: 'execute',
        stage: this.name,
        itemId: context.item.id,
      });
    }
    return { kind: 'script', text };
  }
}
