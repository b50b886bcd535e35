/* =============================================================================
 * MODULE: jsMiner
 * =============================================================================
 * Mines JavaScript responses for endpoints and parameter names.
 *
 *   pattern     regular expressions over the source text
 *   evaluation  pattern output plus whatever the acorn interpreter can fold;
 *               any evaluation fault falls back to pattern output alone
 * =============================================================================
 */

import { defineScanner, type IDiscoveryScanner } from '../../core/IDiscoveryScanner.js';
import { toEvaluationFault, type EvaluationFault } from '../../core/errors.js';
import { createModuleLogger } from '../../core/logger.js';
import { bodyText, headerValue, type Candidate, type Discovery, type FetchResult, type JsMiningMode } from '../../core/types.js';
import { getDefaultCatalog } from '../../config/catalog.js';
import { MinedSet, type MinedEndpoints } from './endpoints.js';
import { minePatterns } from './patternMiner.js';
import { DEFAULT_EVALUATION_BUDGET, mineByEvaluation, type EvaluationBudget } from './evaluationMiner.js';

export { minePatterns } from './patternMiner.js';
export { mineByEvaluation, DEFAULT_EVALUATION_BUDGET, type EvaluationBudget } from './evaluationMiner.js';
export { isEndpointLike, type MinedEndpoints } from './endpoints.js';

const log = createModuleLogger('jsMiner');

const JS_CONTENT_TYPE = /\b(?:java|ecma)script\b/i;
const JS_PATH = /\.(?:m|c)?js$/i;

export interface JsMinerOptions {
  mode: JsMiningMode;
  budget?: EvaluationBudget;
  parameterNames?: readonly string[];
  /** Told about every evaluation fault before the fallback */
  onFault?: (fault: EvaluationFault, source: string) => void;
}

/**
 * JavaScript by content-type or path, and not on an IP target
 */
export function isJavaScriptResponse(candidate: Candidate, result: FetchResult): boolean {
  if (candidate.origin.isIpAddress) return false;
  if (JS_CONTENT_TYPE.test(headerValue(result, 'content-type'))) return true;
  return JS_PATH.test(new URL(result.finalUrl).pathname);
}

export function mineJavaScript(source: string, options: JsMinerOptions, origin = '<inline>'): MinedEndpoints {
  const parameterNames = options.parameterNames ?? getDefaultCatalog().parameterNames;
  const patterns = minePatterns(source, parameterNames);
  if (options.mode === 'pattern') return patterns;

  try {
    const evaluated = mineByEvaluation(source, options.budget ?? DEFAULT_EVALUATION_BUDGET);
    return new MinedSet().merge(patterns).merge(evaluated).toResult();
  } catch (error) {
    const fault = toEvaluationFault(error);
    log.debug({ url: origin, reason: fault.reason, err: fault.message }, 'Evaluation fault, using pattern output');
    options.onFault?.(fault, origin);
    return patterns;
  }
}

export function createJsMinerScanner(options: JsMinerOptions): IDiscoveryScanner {
  const scan = (candidate: Candidate, result: FetchResult): Discovery[] => {
    const mined = mineJavaScript(bodyText(result), options, result.finalUrl);
    return [
      ...mined.endpoints.map(
        (value): Discovery => ({ kind: 'JsEndpoint', value, source: candidate.url, status: result.status })
      ),
      ...mined.parameters.map(
        (value): Discovery => ({ kind: 'JsParameter', value, source: candidate.url })
      ),
    ];
  };

  return defineScanner(
    {
      id: 'js_miner',
      name: `JS Miner (${options.mode})`,
      description: 'Endpoints and parameter names embedded in JavaScript assets',
      produces: ['JsEndpoint', 'JsParameter'],
    },
    scan,
    {
      appliesTo: (candidate, result) =>
        !result.error && result.status !== undefined && result.status >= 200 && result.status < 300 &&
        isJavaScriptResponse(candidate, result),
    }
  );
}
