/**
 * Image Extensions - companion `UIImage`, `NSImage` and `Image` support
 *
 * Each enabled framework gets a guarded pair of extensions: one adding an
 * initializer from `SFSymbolResource`, one mirroring every accessor.
 */

import {
  arg,
  availableOn,
  call,
  commented,
  docComment,
  dot,
  expressionBlock,
  forceUnwrap,
  identifier,
  memberType,
  nilLiteral,
  withAttributes,
} from '../ir/builders.js';
import type { DeclarationMutator } from '../mutators/index.js';
import type {
  AccessModifier,
  AvailabilityDescriptor,
  Declaration,
  Expression,
  ImageFramework,
  ImportDescription,
} from '../types.js';
import { IMAGE_FRAMEWORKS } from '../types.js';
import { buildImageAccessor, RESOURCE_TYPE_NAME, type AccessorEntry } from './accessor-builder.js';

export interface ImageFrameworkSupport {
  framework: ImageFramework;
  /** Module-qualified image type */
  imageType: string;
  /** Compilation condition for the import and the extensions */
  condition: string;
  attributes: AvailabilityDescriptor[];
  /** Classes need a convenience initializer, structs a plain one */
  isConvenienceInit: boolean;
  /** Body of `init(systemSymbolResource:)` */
  initBody: Expression;
}

const resourceName = (): Expression => dot('systemName', identifier('resource'));

const selfInit = (): Expression => dot('init', identifier('self'));

export const IMAGE_FRAMEWORK_SUPPORT: Readonly<Record<ImageFramework, ImageFrameworkSupport>> = {
  SwiftUI: {
    framework: 'SwiftUI',
    imageType: 'SwiftUI.Image',
    condition: 'canImport(SwiftUI)',
    attributes: [
      availableOn([
        { platform: 'iOS', version: '13.0' },
        { platform: 'macOS', version: '11.0' },
        { platform: 'tvOS', version: '13.0' },
        { platform: 'watchOS', version: '6.0' },
      ]),
    ],
    isConvenienceInit: false,
    initBody: call(selfInit(), [arg('systemName', resourceName())]),
  },
  UIKit: {
    framework: 'UIKit',
    imageType: 'UIKit.UIImage',
    condition: 'canImport(UIKit) && !os(watchOS)',
    attributes: [
      availableOn([
        { platform: 'iOS', version: '13.0' },
        { platform: 'tvOS', version: '13.0' },
      ]),
      { kind: 'unavailable', platform: 'watchOS' },
    ],
    isConvenienceInit: true,
    initBody: forceUnwrap(call(selfInit(), [arg('systemName', resourceName())])),
  },
  AppKit: {
    framework: 'AppKit',
    imageType: 'AppKit.NSImage',
    condition: 'canImport(AppKit)',
    attributes: [availableOn([{ platform: 'macOS', version: '11.0' }])],
    isConvenienceInit: true,
    initBody: forceUnwrap(
      call(selfInit(), [
        arg('systemSymbolName', resourceName()),
        arg('accessibilityDescription', nilLiteral()),
      ])
    ),
  },
};

/**
 * Enabled frameworks in canonical order, without duplicates
 */
export function orderedFrameworks(enabled: readonly ImageFramework[]): ImageFramework[] {
  return IMAGE_FRAMEWORKS.filter(framework => enabled.includes(framework));
}

export function frameworkImport(framework: ImageFramework): ImportDescription {
  return { moduleName: framework, condition: IMAGE_FRAMEWORK_SUPPORT[framework].condition };
}

function shortTypeName(imageType: string): string {
  const components = imageType.split('.');
  return components[components.length - 1] ?? imageType;
}

/**
 * `#if <condition>` group holding the initializer extension and the accessor
 * extension, both under the framework's availability attributes
 */
export function buildImageExtensions(
  framework: ImageFramework,
  entries: readonly AccessorEntry[],
  accessModifier: AccessModifier,
  mutators: readonly DeclarationMutator[]
): Declaration {
  const support = IMAGE_FRAMEWORK_SUPPORT[framework];
  const imageType = memberType(support.imageType);

  const initializer = commented(
    docComment(`Initialize \`${shortTypeName(support.imageType)}\` with a \`${RESOURCE_TYPE_NAME}\`.`),
    {
      kind: 'function',
      accessModifier,
      functionKind: {
        kind: 'initializer',
        isFailable: false,
        isConvenience: support.isConvenienceInit,
      },
      parameters: [
        { label: 'systemSymbolResource', name: 'resource', type: memberType(RESOURCE_TYPE_NAME) },
      ],
      keywords: [],
      body: [expressionBlock(support.initBody)],
    }
  );

  const initializerExtension = withAttributes(support.attributes, {
    kind: 'typeExtension',
    onType: support.imageType,
    conformances: [],
    declarations: [initializer],
  });

  const accessorExtension = withAttributes(support.attributes, {
    kind: 'typeExtension',
    onType: support.imageType,
    conformances: [],
    declarations: entries.map(entry => buildImageAccessor(entry, imageType, accessModifier, mutators)),
  });

  return {
    kind: 'conditionalCompilation',
    condition: support.condition,
    declarations: [initializerExtension, accessorExtension],
  };
}
