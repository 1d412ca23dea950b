/**
 * CLI command for trying path expressions against a tree file.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { JsonTreeSource } from '../../core/parser/json-source.js';
import { parsePath, select, type SyntaxNode } from '../../core/tree/index.js';
import { logger } from '../../utils/logger.js';

interface QueryCommandOptions {
  json?: boolean;
  maxMatches: string;
}

interface MatchView {
  tag: string;
  token: string;
  role?: string;
  line?: number;
  column?: number;
}

function toView(node: SyntaxNode): MatchView {
  return {
    tag: node.tag,
    token: node.token,
    role: node.role,
    line: node.position?.line,
    column: node.position?.column,
  };
}

/**
 * Create the query command.
 *
 * Usage: setting-extractor query "//FieldDeclaration/ParameterizedType" tree.json
 */
export function createQueryCommand(): Command {
  return new Command('query')
    .description('Evaluate a path expression against a syntax tree JSON file')
    .argument('<expression>', "Path expression, e.g. //QualifiedName/SimpleName[@token='Property']")
    .argument('<tree>', 'Tree file (native or UAST JSON)')
    .option('--max-matches <n>', 'Maximum matches to show', '50')
    .option('--json', 'Output as JSON')
    .action(async (expression: string, treeFile: string, options: QueryCommandOptions) => {
      let matches: SyntaxNode[];
      try {
        const query = parsePath(expression);
        const tree = await new JsonTreeSource().parse(treeFile);
        matches = select(tree, query);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }

      if (options.json) {
        console.log(JSON.stringify({ expression, total: matches.length, matches: matches.map(toView) }, null, 2));
        return;
      }

      if (matches.length === 0) {
        console.log(chalk.yellow('No matches'));
        return;
      }

      const maxMatches = parseInt(options.maxMatches, 10);
      console.log(chalk.bold(`${matches.length} match(es)`));
      for (const match of matches.slice(0, maxMatches)) {
        const view = toView(match);
        const location = view.line !== undefined ? chalk.cyan(`${view.line}:${view.column ?? 0} `) : '';
        const role = view.role ? chalk.dim(` (${view.role})`) : '';
        const token = view.token ? ` ${JSON.stringify(view.token)}` : '';
        console.log(`  ${location}${view.tag}${token}${role}`);
      }
      if (matches.length > maxMatches) {
        console.log(chalk.dim(`  ... ${matches.length - maxMatches} more (use --max-matches to see all)`));
      }
    });
}
