/**
 * Annotator Exports
 */

export {
  AnnotationSession,
  createAnnotationSession,
  type AnnotationSessionOptions,
} from './session.js';

export {
  annotatePost,
  annotatePosts,
  classifyContentLength,
  AnnotationRunError,
  type AnnotatePostsOptions,
  type SessionOpener,
} from './post-annotator.js';
