import { CliqueConfiguration } from './configuration';

/**
 * Size of the clique that contains n, or 0 if no clique does.
 * When n sits in two cliques the smaller size is reported, so equal
 * configurations always classify the same way.
 */
export function endingCliqueSize(config: CliqueConfiguration, n: number): number {
    let size = 0;
    for (const clique of config.cliques) {
        if (clique.has(n) && (size === 0 || clique.size < size)) size = clique.size;
    }
    return size;
}
