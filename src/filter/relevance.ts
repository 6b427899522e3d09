// Spine and anatomical terms that mark an article as in scope.
export const INCLUSION_KEYWORDS = [
  "spine", "spinal", "cervical", "thoracic", "lumbar", "sacral", "vertebr",
  "disc", "disk", "scoliosis", "kyphosis", "lordosis", "myelopathy",
  "radiculopathy", "lumbar stenosis", "cervical stenosis", "fusion", "laminectomy", "discectomy",
  "foraminotomy", "decompression", "interbody", "pedicle", "screw",
  "cage", "rod", "plate", "cauda equina", "thecal sac",
] as const;

// Brain and cranial terms; any hit excludes the article.
export const EXCLUSION_KEYWORDS = [
  "cerebrospinal",
  "deep brain stimulation", "dbs", "brain stimulation",
  "subthalamic", "subthalamic nucleus",
  "cerebral", "cerebrum", "cerebellum",
  "transcranial", "intracranial",
  "pneumocephalus", "cranial", "craniotomy",
  "electroencephalogram", "eeg",
  "brain", "brain surgery",
  "neurosurgery AND NOT spine", "neurosurgical AND NOT spine",
  "parkinson", "alzheimer", "epilepsy", "seizure",
  "glioma", "meningioma", "brain tumor",
] as const;

/**
 * Keyword relevance check on a feed entry.
 *
 * Matching is plain case-insensitive substring search, so "disk" also
 * matches "diskette" and "rod" matches "production".
 */
export function isRelevant(title: string, description?: string | null): boolean {
  if (!title) {
    return false;
  }

  let text = title.toLowerCase();
  if (description) {
    text += " " + description.toLowerCase();
  }

  const included = INCLUSION_KEYWORDS.some((keyword) => text.includes(keyword.toLowerCase()));
  if (!included) {
    return false;
  }

  return !EXCLUSION_KEYWORDS.some((keyword) => text.includes(keyword.toLowerCase()));
}
