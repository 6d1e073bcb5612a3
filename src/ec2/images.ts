/**
 * Operating-system image families.
 *
 * Each family carries a pinned fallback AMI (used when resolving offline)
 * and the DescribeImages filters that find its newest public image.
 */

export interface ImageFamily {
  name: string;
  /** Whole phrases; any one occurring in the description selects the family */
  phrases: string[];
  fallbackImageId: string;
  namePattern: string;
  ownerFilter: { name: "owner-alias" | "owner-id"; value: string };
}

export const IMAGE_FAMILIES: readonly ImageFamily[] = [
  {
    name: "amazon linux",
    phrases: ["amazon linux"],
    fallbackImageId: "ami-0c55b159cbfafe1f0",
    namePattern: "amzn2-ami-hvm-*-x86_64-gp2",
    ownerFilter: { name: "owner-alias", value: "amazon" },
  },
  {
    name: "ubuntu",
    phrases: ["ubuntu"],
    fallbackImageId: "ami-0dba2cb6798deb6d8",
    namePattern: "ubuntu/images/hvm-ssd/ubuntu-focal-20.04-amd64-server-*",
    ownerFilter: { name: "owner-id", value: "099720109477" },
  },
  {
    name: "windows",
    phrases: ["windows"],
    fallbackImageId: "ami-0ab193018fec6aea5",
    namePattern: "Windows_Server-2019-English-Full-Base-*",
    ownerFilter: { name: "owner-alias", value: "amazon" },
  },
  {
    name: "red hat",
    phrases: ["red hat", "rhel"],
    fallbackImageId: "ami-0520e698dd500b1d1",
    namePattern: "RHEL-8*-x86_64-*",
    ownerFilter: { name: "owner-id", value: "309956199498" },
  },
];

export const DEFAULT_IMAGE_FAMILY = IMAGE_FAMILIES[0];

/**
 * First family, in table order, with a phrase inside the description;
 * Amazon Linux otherwise
 */
export function matchImageFamily(description: string): ImageFamily {
  const text = description.toLowerCase();
  return (
    IMAGE_FAMILIES.find((family) => family.phrases.some((phrase) => text.includes(phrase))) ??
    DEFAULT_IMAGE_FAMILY
  );
}
