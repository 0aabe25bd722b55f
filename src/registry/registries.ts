import type {
    Article,
    Author,
    Category,
    Department,
    Institution,
    Journal,
    Publication,
} from '../types/index.js';
import { VersionMediator } from '../mediator/version-mediator.js';
import { GroupingMediator } from '../mediator/grouping-mediator.js';
import { ArticleRegistry } from './article-registry.js';
import { Registry } from './registry.js';

/**
 * Cross-reference indexes built alongside the registries.
 */
export interface Mediators {
    versions: VersionMediator;
    institutionPublications: GroupingMediator<Publication>;
    departmentPublications: GroupingMediator<Publication>;
    categoryPublications: GroupingMediator<Publication>;
    linkTypeArticles: GroupingMediator<Article>;
}

/**
 * One store per entity kind plus the mediators that reference the same instances.
 */
export interface Registries {
    articles: ArticleRegistry;
    journals: Registry<Journal>;
    institutions: Registry<Institution>;
    departments: Registry<Department>;
    categories: Registry<Category>;
    authors: Registry<Author>;
    publications: Registry<Publication>;
    mediators: Mediators;
}

export function createRegistries(): Registries {
    const versions = new VersionMediator();
    return {
        articles: new ArticleRegistry(versions),
        journals: new Registry('journal'),
        institutions: new Registry('institution'),
        departments: new Registry('department'),
        categories: new Registry('category'),
        authors: new Registry('author'),
        publications: new Registry('publication'),
        mediators: {
            versions,
            institutionPublications: new GroupingMediator('institution'),
            departmentPublications: new GroupingMediator('department'),
            categoryPublications: new GroupingMediator('category'),
            linkTypeArticles: new GroupingMediator('link_type'),
        },
    };
}

let sharedRegistries: Registries | null = null;

/**
 * Process-wide registries, created on first use.
 */
export function getRegistries(): Registries {
    if (!sharedRegistries) {
        sharedRegistries = createRegistries();
    }
    return sharedRegistries;
}

/**
 * Drop the process-wide registries (for testing).
 */
export function resetRegistries(): void {
    sharedRegistries = null;
}
