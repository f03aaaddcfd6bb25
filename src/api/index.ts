export { handlePosts } from './posts';
export { handlePreprocess } from './preprocess';
export { handleTags } from './tags';
export { handleStats } from './stats';
