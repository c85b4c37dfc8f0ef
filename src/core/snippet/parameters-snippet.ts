/**
 * Documents a set of named parameters after checking them against the
 * operation they were captured from.
 */
import { InternalConsistencyError } from '../../utils/errors.js';
import { DescriptorRegistry } from '../descriptors/registry.js';
import type { DocumentableParameter } from '../descriptors/types.js';
import type { Operation } from '../operation/types.js';
import { TemplatedSnippet } from './templated-snippet.js';
import { computeParameterDiscrepancy, hasDiscrepancy, sameNames } from './verifier.js';
import type {
  ActualParameterExtractor,
  ParametersModel,
  VerificationFailureHandler,
} from './types.js';

export interface ParametersSnippetOptions<D extends DocumentableParameter = DocumentableParameter> {
  snippetName: string;
  descriptors: Iterable<D>;
  extractor: ActualParameterExtractor;
  failureHandler: VerificationFailureHandler;
  /** Extra keys merged into the rendered model */
  attributes?: Record<string, unknown>;
}

export class ParametersSnippet<D extends DocumentableParameter = DocumentableParameter>
  extends TemplatedSnippet<ParametersModel> {
  readonly registry: DescriptorRegistry<D>;
  private readonly extractor: ActualParameterExtractor;
  private readonly failureHandler: VerificationFailureHandler;

  /**
   * @throws InvalidDescriptorError if any descriptor has a blank name or description
   */
  constructor(options: ParametersSnippetOptions<D>) {
    super(options.snippetName, options.attributes);
    this.registry = new DescriptorRegistry(options.descriptors);
    this.extractor = options.extractor;
    this.failureHandler = options.failureHandler;
  }

  /**
   * Compare the operation's parameters with the documented ones.
   *
   * On a mismatch the failure handler decides: it throws to abort, or
   * returns and model building carries on.
   */
  verifyParameters(operation: Operation): void {
    const actual = this.extractor.extractActualParameters(operation);
    const expected = this.registry.names();
    const discrepancy = computeParameterDiscrepancy(expected, actual);

    if (hasDiscrepancy(discrepancy)) {
      this.failureHandler.verificationFailed(discrepancy.undocumented, discrepancy.missing);
    } else if (!sameNames(actual, expected)) {
      throw new InternalConsistencyError(
        'Parameter sets differ although neither side has unmatched names',
        { actual: Array.from(actual), expected: Array.from(expected) }
      );
    }
  }

  /**
   * Verify, then build one model entry per descriptor in registry order.
   */
  createModel(operation: Operation): ParametersModel {
    this.verifyParameters(operation);
    return {
      parameters: this.registry.descriptors().map((descriptor) => descriptor.toModel()),
    };
  }
}
