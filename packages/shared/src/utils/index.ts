export {
  paginate,
  sliceWindow,
  pageControlRange,
  buildNavigationControls,
  NAVIGATION_LABELS,
} from './pagination';
