/**
 * Connection scorer backed by an external scoring command
 */

import { Scorer } from '../core/collaborators';
import { ScorerUnavailableError, errorMessage } from '../core/errors';
import { isInterfaceName } from '../core/schema';
import { Exec, ScoreRecommendation } from '../core/types';

/**
 * Runs `<command> best <currentPrimary>` and reads the first output line,
 * optionally followed by a numeric score (`mob1s1a1 87`)
 */
export class CommandScorer implements Scorer {
  constructor(
    private readonly command: string,
    private readonly exec: Exec
  ) {}

  async recommend(currentPrimary: string): Promise<ScoreRecommendation> {
    let output: string;
    try {
      output = await this.exec(`${this.command} best ${currentPrimary}`);
    } catch (error) {
      throw new ScorerUnavailableError(`Connection scoring failed: ${errorMessage(error)}`);
    }
    return parseRecommendation(output);
  }
}

export function parseRecommendation(output: string): ScoreRecommendation {
  const firstLine = output.split('\n').map((line) => line.trim()).find((line) => line !== '');
  if (!firstLine) {
    throw new ScorerUnavailableError('Connection scoring returned no recommendation');
  }

  const [iface, scoreText] = firstLine.split(/\s+/);
  if (!isInterfaceName(iface)) {
    throw new ScorerUnavailableError(`Connection scoring returned an invalid interface: ${iface}`);
  }

  const score = scoreText === undefined ? undefined : Number(scoreText);
  return score !== undefined && Number.isFinite(score) ? { interface: iface, score } : { interface: iface };
}
