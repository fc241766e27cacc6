import { Command } from 'commander';
import { CRITIC_KINDS, createSimilarityRegistry } from '../../critics/index.js';
import { style, subheader, bullet } from '../theme.js';

const CRITIC_HELP: Record<(typeof CRITIC_KINDS)[number], string> = {
  binary: 'exact equality; full weight or nothing',
  numeric: 'closeness within valueRange; matchThreshold (default 0.8)',
  similarity: 'text similarity by metric; similarityThreshold (default 0.8)',
};

export const criticsCommand = new Command('critics')
  .description('List critic types and similarity metrics')
  .action(() => {
    console.log(subheader('Critics'));
    for (const kind of CRITIC_KINDS) {
      console.log(bullet(`${style.bold(kind)} ${style.dim(CRITIC_HELP[kind])}`));
    }

    console.log(subheader('Similarity metrics'));
    for (const name of createSimilarityRegistry().keys()) {
      console.log(bullet(style.highlight(name)));
    }
    console.log();
  });
