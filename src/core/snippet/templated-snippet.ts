import type { Operation } from '../operation/types.js';
import type { Snippet, SnippetContext, SnippetModel } from './types.js';

/**
 * Base for snippets rendered through a template engine.
 *
 * Fixed attributes given at construction are merged into every model;
 * keys produced by {@link createModel} take precedence over them.
 */
export abstract class TemplatedSnippet<M extends SnippetModel = SnippetModel> implements Snippet {
  protected constructor(
    readonly snippetName: string,
    protected readonly attributes: Readonly<Record<string, unknown>> = {}
  ) {}

  abstract createModel(operation: Operation): M;

  /**
   * Model plus the snippet's fixed attributes, ready for rendering.
   */
  renderModel(operation: Operation): SnippetModel {
    return { ...this.attributes, ...this.createModel(operation) };
  }

  async document(operation: Operation, context: SnippetContext): Promise<void> {
    const content = context.templateEngine.render(this.snippetName, this.renderModel(operation));
    await context.writer.write(operation.name, this.snippetName, content);
  }
}
