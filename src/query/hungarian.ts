/**
 * Detect resource names that repeat their own type, e.g. an
 * `aws_s3_bucket` called `logs_bucket` or `mybucket`.
 */

const NAME_SEPARATORS = /[^a-z0-9]+/;

export function isHungarian(type: string, name: string): boolean {
  if (type === "" || name === "") {
    return false;
  }

  const nameLower = name.toLowerCase();
  const nameParts = nameLower.split(NAME_SEPARATORS);

  for (const token of type.toLowerCase().split("_")) {
    if (token === "") continue;

    if (nameParts.includes(token)) {
      return true;
    }

    // Names written without separators
    if (nameLower.includes(token)) {
      return true;
    }
  }

  return false;
}
